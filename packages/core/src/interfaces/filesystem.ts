/**
 * Abstract File System Interfaces
 *
 * File-backed request bodies read through these so the client does not
 * depend on a specific runtime's file API.
 */

export interface IFileStat {
  size: number
  mtime: Date
  isDirectory: boolean
  isFile: boolean
}

export interface IFileHandle {
  /** Read data from the file at a specific position. */
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }>

  /** Close the file handle. */
  close(): Promise<void>
}

export interface IFileSystem {
  /** Open a file for reading. */
  open(path: string): Promise<IFileHandle>

  /** Get file statistics. */
  stat(path: string): Promise<IFileStat>
}
