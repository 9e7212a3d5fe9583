import type { Result } from "@structmap/core";

/**
 * Port for file system operations.
 */
export interface FileSystem {
  read(filePath: string): Result<string, Error>;

  write(filePath: string, content: string): Result<void, Error>;

  exists(filePath: string): boolean;

  isDirectory(filePath: string): boolean;
}
