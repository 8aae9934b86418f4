import { promises as fs } from "fs";
import { StringDecoder } from "string_decoder";

const DEFAULT_CHUNK_BYTES = 64 * 1024;

/** A lone carriage return also ends a line (progress bar redraws). */
const LINE_BREAK = /\r\n|\r|\n/;

export interface TailRead {
  lines: string[];
  bytesRead: number;
}

/**
 * Read cursor over a file that is still being written. Only complete lines
 * are returned; a trailing partial line waits for its newline or for flush().
 */
export class FileTail {
  private handle: fs.FileHandle | null = null;
  private position = 0;
  private pending = "";
  private endedOnCr = false;
  private readonly decoder = new StringDecoder("utf8");
  private readonly buffer: Buffer;

  constructor(
    private readonly filePath: string,
    chunkBytes = DEFAULT_CHUNK_BYTES
  ) {
    this.buffer = Buffer.alloc(chunkBytes);
  }

  get offset(): number {
    return this.position;
  }

  async open(): Promise<void> {
    this.handle ??= await fs.open(this.filePath, "r");
  }

  async read(): Promise<TailRead> {
    if (!this.handle) throw new Error(`tail of ${this.filePath} is not open`);
    const { bytesRead } = await this.handle.read(this.buffer, 0, this.buffer.length, this.position);
    if (bytesRead === 0) return { lines: [], bytesRead: 0 };

    this.position += bytesRead;
    let text = this.decoder.write(this.buffer.subarray(0, bytesRead));
    // The "\n" of a "\r\n" split across reads; its line was already returned.
    if (this.endedOnCr && text.startsWith("\n")) text = text.slice(1);
    this.endedOnCr = text.endsWith("\r");
    this.pending += text;
    const parts = this.pending.split(LINE_BREAK);
    this.pending = parts.pop() ?? "";
    return { lines: parts, bytesRead };
  }

  /** Returns the unterminated final line, if any, and clears it. */
  flush(): string | null {
    const rest = this.pending + this.decoder.end();
    this.pending = "";
    return rest.length > 0 ? rest : null;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) await handle.close();
  }
}

/** Last `count` lines of a file, joined and trimmed; "" when the file cannot be read. */
export async function readTailLines(filePath: string, count: number, maxBytes = DEFAULT_CHUNK_BYTES): Promise<string> {
  if (count <= 0) return "";
  let fd: fs.FileHandle | null = null;
  try {
    fd = await fs.open(filePath, "r");
    const { size } = await fd.stat();
    const start = Math.max(0, size - maxBytes);
    const buf = Buffer.alloc(size - start);
    const { bytesRead } = await fd.read(buf, 0, buf.length, start);
    const lines = buf.subarray(0, bytesRead).toString("utf8").split(LINE_BREAK);
    if (start > 0) lines.shift();
    while (lines.length && lines[lines.length - 1] === "") lines.pop();
    return lines.slice(-count).join("\n").trim();
  } catch {
    return "";
  } finally {
    await fd?.close();
  }
}
