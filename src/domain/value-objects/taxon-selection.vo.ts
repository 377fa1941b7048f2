/**
 * Taxon Selection Value Object
 * The include/exclude taxid pair a run collects, and the file names derived from it
 */
export interface TaxonSelectionProps {
  includeTaxid: string;
  excludeTaxid?: string;
}

export class TaxonSelectionVO {
  static readonly DEFAULT_INCLUDE_TAXID = '548681';

  private static readonly TAXID_PATTERN = /^\d+$/;

  private constructor(
    private readonly _includeTaxid: string,
    private readonly _excludeTaxid: string,
  ) {}

  static create(props: TaxonSelectionProps): TaxonSelectionVO {
    const include = props.includeTaxid.trim();
    const exclude = props.excludeTaxid?.trim() ?? '';

    if (!TaxonSelectionVO.TAXID_PATTERN.test(include)) {
      throw new Error(`Invalid taxid to include: "${props.includeTaxid}"`);
    }
    if (exclude !== '' && !TaxonSelectionVO.TAXID_PATTERN.test(exclude)) {
      throw new Error(`Invalid taxid to exclude: "${props.excludeTaxid ?? ''}"`);
    }

    return new TaxonSelectionVO(include, exclude);
  }

  get includeTaxid(): string {
    return this._includeTaxid;
  }

  /** Empty string when nothing is excluded */
  get excludeTaxid(): string {
    return this._excludeTaxid;
  }

  hasExclusion(): boolean {
    return this._excludeTaxid !== '';
  }

  get outputFileName(): string {
    return `${this.baseName()}.fa`;
  }

  get ledgerFileName(): string {
    return `${this.baseName()}.tmp`;
  }

  private baseName(): string {
    return this.hasExclusion()
      ? `WGS4taxid${this._includeTaxid}-${this._excludeTaxid}`
      : `WGS4taxid${this._includeTaxid}`;
  }

  toString(): string {
    return this.hasExclusion()
      ? `taxid ${this._includeTaxid} excluding taxid ${this._excludeTaxid}`
      : `taxid ${this._includeTaxid}`;
  }
}
