export interface FileEntry {
  path: string;
}

export interface FileSource {
  name: string;
  scan(): AsyncGenerator<FileEntry>;
  count(): Promise<number>;
}
