import {
  LocalArchiveStorageFactoryPort,
  LocalArchiveStoragePort,
} from '../../src/application/ports/output/local-archive-storage.port';
import { InMemoryDisk } from './in-memory-disk';

/**
 * In-Memory Archive Storage Adapter
 * Archives are stored already decompressed; paths are `<workDir>/<fileName>`
 */
export class InMemoryArchiveStorage implements LocalArchiveStoragePort {
  constructor(
    private readonly disk: InMemoryDisk,
    private readonly workDir: string,
    private readonly archiveSuffix: string,
  ) {}

  async listArchives(): Promise<string[]> {
    const prefix = `${this.workDir}/`;
    return this.disk
      .paths()
      .filter((path) => path.startsWith(prefix) && path.endsWith(this.archiveSuffix))
      .map((path) => path.slice(prefix.length))
      .filter((name) => !name.includes('/'));
  }

  async exists(fileName: string): Promise<boolean> {
    return this.disk.has(this.pathFor(fileName));
  }

  async remove(fileName: string): Promise<void> {
    this.disk.delete(this.pathFor(fileName));
  }

  pathFor(fileName: string): string {
    return `${this.workDir}/${fileName}`;
  }

  async *readLines(fileName: string): AsyncGenerator<string> {
    const content = this.disk.read(this.pathFor(fileName));
    let start = 0;
    while (start < content.length) {
      const newline = content.indexOf('\n', start);
      const end = newline === -1 ? content.length : newline + 1;
      yield content.slice(start, end);
      start = end;
    }
  }
}

export class InMemoryArchiveStorageFactory implements LocalArchiveStorageFactoryPort {
  constructor(
    private readonly disk: InMemoryDisk,
    private readonly archiveSuffix = '.fsa_nt.gz',
  ) {}

  forDirectory(workDir: string): LocalArchiveStoragePort {
    return new InMemoryArchiveStorage(this.disk, workDir, this.archiveSuffix);
  }
}
