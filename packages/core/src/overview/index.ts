// packages/core/src/overview/index.ts -- barrel re-export

export { OverviewService } from './overview-service.js';
