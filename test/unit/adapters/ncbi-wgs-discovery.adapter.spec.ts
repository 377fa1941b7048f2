import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import {
  NcbiWgsDiscoveryAdapter,
  parseDiscoveryResponse,
} from '../../../src/infrastructure/adapters/discovery/ncbi-wgs-discovery.adapter';
import { HttpClientService } from '../../../src/shared/http/http-client.service';
import { TaxonSelectionVO } from '../../../src/domain/value-objects/taxon-selection.vo';
import { InterruptedError, TransientTransferError } from '../../../src/domain/errors/pipeline.errors';
import { createConfigService, createTestLogger } from '../helpers/mock-factories';

describe('parseDiscoveryResponse', () => {
  it('should strip the scheme prefix and drop blank lines', () => {
    expect(parseDiscoveryResponse('WGS_VDB://AAAA01\n\n  WGS_VDB://BBBB01  \r\nCCCC01\n')).toEqual([
      'AAAA01',
      'BBBB01',
      'CCCC01',
    ]);
  });

  it('should return nothing for an empty answer', () => {
    expect(parseDiscoveryResponse('\n')).toEqual([]);
  });
});

describe('NcbiWgsDiscoveryAdapter', () => {
  let agent: MockAgent;
  let httpClient: HttpClientService;
  let adapter: NcbiWgsDiscoveryAdapter;

  const selection = TaxonSelectionVO.create({ includeTaxid: '548681' });
  const path = '/taxid2wgs.cgi?INCLUDE_TAXIDS=548681&EXCLUDE_TAXIDS=';

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    httpClient = new HttpClientService(createTestLogger(), agent);
    adapter = new NcbiWgsDiscoveryAdapter(httpClient, createConfigService());
  });

  afterEach(async () => {
    agent.assertNoPendingInterceptors();
    await agent.close();
  });

  it('should list the collections of the selection', async () => {
    agent
      .get('https://discovery.test')
      .intercept({ path, method: 'GET' })
      .reply(200, 'WGS_VDB://AAAA01\nWGS_VDB://BBBB01\n');

    await expect(adapter.listCollectionIds(selection)).resolves.toEqual(['AAAA01', 'BBBB01']);
  });

  it('should send the excluded taxid', async () => {
    agent
      .get('https://discovery.test')
      .intercept({ path: '/taxid2wgs.cgi?INCLUDE_TAXIDS=10239&EXCLUDE_TAXIDS=9606', method: 'GET' })
      .reply(200, 'WGS_VDB://CCCC01\n');

    const withExclusion = TaxonSelectionVO.create({ includeTaxid: '10239', excludeTaxid: '9606' });

    await expect(adapter.listCollectionIds(withExclusion)).resolves.toEqual(['CCCC01']);
  });

  it('should report an error status as transient', async () => {
    agent.get('https://discovery.test').intercept({ path, method: 'GET' }).reply(503, 'busy');

    const error = await adapter.listCollectionIds(selection).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientTransferError);
    expect(error).toHaveProperty('message', 'Discovery service answered with status 503');
  });

  it('should report a network failure as transient, without retrying it itself', async () => {
    agent
      .get('https://discovery.test')
      .intercept({ path, method: 'GET' })
      .replyWithError(new Error('socket hang up'));

    const error = await adapter.listCollectionIds(selection).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientTransferError);
    expect(error).toHaveProperty('operation', 'discovery');
  });

  it('should report an aborted request as an interruption', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(adapter.listCollectionIds(selection, controller.signal)).rejects.toBeInstanceOf(InterruptedError);
  });
});
