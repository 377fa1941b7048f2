/**
 * Collection Id Value Object
 * Identifier of one remote WGS project (e.g. `AAAA01`). Opaque, except that
 * it names a directory and files: no whitespace, no `/`, not `.` or `..`.
 */
export class CollectionIdVO {
  private static readonly UNSAFE_PATTERN = /[\s/]/;

  private constructor(private readonly _value: string) {}

  static create(value: string): CollectionIdVO {
    const trimmed = value.trim();
    if (trimmed === '' || trimmed === '.' || trimmed === '..' || CollectionIdVO.UNSAFE_PATTERN.test(trimmed)) {
      throw new Error(`Invalid collection id: "${value}"`);
    }
    return new CollectionIdVO(trimmed);
  }

  get value(): string {
    return this._value;
  }

  /**
   * Two-level prefix sharding used by the archive:
   * `<baseDir>/<chars 1-2>/<chars 3-4>/<id>`; shards an id is too short
   * for are left out
   */
  remoteDirectory(baseDir: string): string {
    const base = baseDir.replace(/\/+$/, '');
    const shards = [this._value.slice(0, 2), this._value.slice(2, 4)].filter((shard) => shard !== '');
    return [base, ...shards, this._value].join('/');
  }

  /** Local archive files of this collection are named after it. */
  ownsFile(fileName: string): boolean {
    return fileName.startsWith(this._value);
  }

  toString(): string {
    return this._value;
  }
}
