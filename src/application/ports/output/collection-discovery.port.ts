import { TaxonSelectionVO } from '../../../domain/value-objects/taxon-selection.vo';

/**
 * Collection Discovery Port (Driven Port)
 * Lookup of the collection identifiers published for a taxon selection
 */
export interface CollectionDiscoveryPort {
  /**
   * Issue one lookup request and return the raw identifiers in service order.
   * Network faults surface as TransientTransferError; no retry happens here.
   */
  listCollectionIds(selection: TaxonSelectionVO, signal?: AbortSignal): Promise<string[]>;
}
