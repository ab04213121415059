/**
 * File access needed to play back startup scripts and read the documents
 * they load. Introspection never writes.
 */
export interface IFileSystemService {
  readFile(filePath: string): Promise<string>;
  exists(filePath: string): Promise<boolean>;
  isDirectory(filePath: string): Promise<boolean>;
}
