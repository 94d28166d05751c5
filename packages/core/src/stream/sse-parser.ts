// packages/core/src/stream/sse-parser.ts — Incremental text/event-stream parser

export interface SseFrame {
  event: string;
  data: string;
  id?: string;
}

/**
 * Feed decoded chunks in; complete frames come out. Partial lines and
 * partial frames are carried over to the next chunk.
 */
export class SseParser {
  private buffer = '';
  private event = '';
  private data: string[] = [];
  private id: string | undefined;

  push(chunk: string): SseFrame[] {
    this.buffer += chunk;
    const lines = this.buffer.split(/\r?\n/);
    this.buffer = lines.pop() ?? '';

    const frames: SseFrame[] = [];
    for (const line of lines) {
      if (line === '') {
        if (this.data.length > 0) {
          const frame: SseFrame = { event: this.event || 'message', data: this.data.join('\n') };
          if (this.id !== undefined) frame.id = this.id;
          frames.push(frame);
        }
        this.event = '';
        this.data = [];
        this.id = undefined;
        continue;
      }
      if (line.startsWith(':')) continue;

      const colon = line.indexOf(':');
      const field = colon === -1 ? line : line.slice(0, colon);
      let value = colon === -1 ? '' : line.slice(colon + 1);
      if (value.startsWith(' ')) value = value.slice(1);

      switch (field) {
        case 'event':
          this.event = value;
          break;
        case 'data':
          this.data.push(value);
          break;
        case 'id':
          this.id = value;
          break;
        default:
          break;
      }
    }
    return frames;
  }
}
