import { mkdir, open } from "node:fs/promises";
import { dirname } from "node:path";

/** Receives every decoded, trimmed line followed by a newline. */
export interface RawLogSink {
  write(chunk: string): void | Promise<void>;
}

export interface FileRawLog extends RawLogSink {
  readonly path: string;
  close(): Promise<void>;
}

export const DEFAULT_RAW_LOG_FILE = "stream-json.log";

/** Opens an append-only raw log, creating its directory when missing. */
export async function openRawLog(path: string): Promise<FileRawLog> {
  await mkdir(dirname(path), { recursive: true });
  const handle = await open(path, "a");
  let closed = false;

  return {
    path,
    async write(chunk: string): Promise<void> {
      await handle.appendFile(chunk, "utf8");
    },
    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      await handle.close();
    }
  };
}
