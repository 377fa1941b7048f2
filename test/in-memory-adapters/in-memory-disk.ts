/**
 * In-Memory Disk
 * Shared path → content map standing in for the work directory
 */
export class InMemoryDisk {
  private readonly files = new Map<string, string>();

  has(path: string): boolean {
    return this.files.has(path);
  }

  read(path: string): string {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file ${path}`);
    }
    return content;
  }

  write(path: string, content: string): void {
    this.files.set(path, content);
  }

  append(path: string, content: string): void {
    this.files.set(path, (this.files.get(path) ?? '') + content);
  }

  delete(path: string): void {
    this.files.delete(path);
  }

  paths(): string[] {
    return [...this.files.keys()].sort();
  }
}
