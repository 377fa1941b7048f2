import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CollectionDiscoveryPort } from '../../../application/ports/output/collection-discovery.port';
import { TaxonSelectionVO } from '../../../domain/value-objects/taxon-selection.vo';
import { InterruptedError, TransientTransferError } from '../../../domain/errors/pipeline.errors';
import { AppConfig } from '../../../config/configuration';
import { HttpClientService, HttpResponse } from '../../../shared/http/http-client.service';

const COLLECTION_PREFIX = 'WGS_VDB://';

/**
 * One `WGS_VDB://<id>` token per line; blank lines are dropped, order kept
 */
export function parseDiscoveryResponse(body: string): string[] {
  return body
    .split('\n')
    .map((line) => line.trim())
    .map((line) => (line.startsWith(COLLECTION_PREFIX) ? line.slice(COLLECTION_PREFIX.length) : line))
    .filter((line) => line.length > 0);
}

/**
 * NCBI WGS Discovery Adapter
 * Implements CollectionDiscoveryPort with the taxid2wgs lookup service
 */
@Injectable()
export class NcbiWgsDiscoveryAdapter implements CollectionDiscoveryPort {
  private readonly logger = new Logger(NcbiWgsDiscoveryAdapter.name);
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly httpClient: HttpClientService,
    configService: ConfigService<AppConfig, true>,
  ) {
    const discovery = configService.get('discovery', { infer: true });
    this.url = discovery.url;
    this.timeoutMs = discovery.timeoutMs;
  }

  async listCollectionIds(selection: TaxonSelectionVO, signal?: AbortSignal): Promise<string[]> {
    let response: HttpResponse;
    try {
      response = await this.httpClient.get(this.url, {
        query: {
          INCLUDE_TAXIDS: selection.includeTaxid,
          EXCLUDE_TAXIDS: selection.excludeTaxid,
        },
        timeout: this.timeoutMs,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new InterruptedError(undefined, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientTransferError(`Discovery request failed: ${message}`, 'discovery', { cause: error });
    }

    this.logger.debug(`Discovery service answered ${response.statusCode} for ${selection.toString()}`);

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new TransientTransferError(
        `Discovery service answered with status ${response.statusCode}`,
        'discovery',
      );
    }

    const ids = parseDiscoveryResponse(response.body);
    this.logger.log(`Discovery returned ${ids.length} collections for ${selection.toString()}`);
    return ids;
  }
}
