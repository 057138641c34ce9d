import { open } from "fs/promises";

/**
 * Stream a text file line by line without loading it whole.
 * Open failures (ENOENT, EACCES) reject before the first line.
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  const handle = await open(filePath, "r");
  try {
    for await (const line of handle.readLines()) {
      yield line;
    }
  } finally {
    await handle.close();
  }
}

/**
 * Read up to `length` bytes from the start of a file.
 * The returned buffer is shorter when the file is.
 */
export async function readPrefix(filePath: string, length: number): Promise<Buffer> {
  const handle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}
