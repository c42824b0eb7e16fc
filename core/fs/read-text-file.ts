import { readFile } from 'node:fs/promises'

/**
 * Read a file as strict UTF-8.
 *
 * A byte order mark stays in the returned text so that columns computed on it
 * line up with the file on disk.
 *
 * @param filePath - File to read.
 * @returns Decoded text.
 * @throws {TypeError} When the bytes are not valid UTF-8.
 */
export async function readTextFile(filePath: string): Promise<string> {
  let bytes = await readFile(filePath)
  return new TextDecoder('utf-8', { ignoreBOM: true, fatal: true }).decode(
    bytes,
  )
}
