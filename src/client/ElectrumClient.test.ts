import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createHash } from 'node:crypto';
import { ElectrumClient } from './ElectrumClient.js';
import { ConfigurationService } from '../infrastructure/config/ConfigurationService.js';
import type { ElectrumClientConfig } from '../infrastructure/config/ConfigurationService.js';
import { ClientEventType } from '../subscriptions/types.js';
import type { BlockHeader, ScripthashStatusCallback } from '../subscriptions/types.js';
import { DataError, PushProtocolViolationError, RpcError } from '../utils/errors.js';
import { createSilentLogger } from '../utils/logger.js';
import { FAKE_SERVER_SOFTWARE, FakeNetwork, flush, sequenceRandom } from '../test-utils/index.js';

const logger = createSilentLogger();

const SH_A = 'a'.repeat(64);
const SH_B = 'b'.repeat(64);
const TX_1 = '1'.repeat(64);
const TX_2 = '2'.repeat(64);
const ROOT = 'f'.repeat(64);
const BRANCH = 'e'.repeat(64);
const STATUS = 'c'.repeat(64);

describe('ElectrumClient', () => {
  let network: FakeNetwork;
  let clock: number;

  const createClient = (config: Partial<ElectrumClientConfig> = {}) =>
    new ElectrumClient({
      configuration: new ConfigurationService(
        { servers: network.catalog(), timeoutMs: 1_000, connectTimeoutMs: 1_000, ...config },
        { env: {}, logger },
      ),
      connectionFactory: network.factory,
      random: sequenceRandom(0),
      now: () => clock,
      logger,
    });

  beforeEach(() => {
    network = new FakeNetwork(['a.example', 'b.example', 'c.example']);
    clock = 1_700_000_000_000;
  });

  describe('lifecycle', () => {
    it('should connect and report the server version', async () => {
      const client = createClient();

      await expect(client.connect()).resolves.toEqual({ serverSoftware: FAKE_SERVER_SOFTWARE, protocolVersion: '1.4' });
      expect(client.getState()).toBe('connected');
      expect(client.getCurrentServer()).toEqual({ host: 'a.example', port: 50002, useTls: true });
      expect(network.server('a.example').received[0]?.params).toEqual(['electrumx-failover-client', ['1.4', '1.4']]);
    });

    it('should try the configured host first on its plain port', async () => {
      const client = createClient({ host: 'c.example', useTls: false });

      await client.connect();

      expect(client.getCurrentServer()).toEqual({ host: 'c.example', port: 50001, useTls: false });
    });

    it('should connect lazily on the first request', async () => {
      network.server('a.example').on('server.banner', () => ({ result: 'Welcome' }));
      const client = createClient();

      await expect(client.serverBanner()).resolves.toBe('Welcome');
      expect(network.attempts).toEqual(['a.example']);
    });

    it('should reject requests after close', async () => {
      const client = createClient();
      await client.connect();
      await client.close();

      expect(client.getState()).toBe('closed');
      await expect(client.serverBanner()).rejects.toMatchObject({ code: 'CLIENT_CLOSED' });
    });
  });

  describe('blocks and transactions', () => {
    beforeEach(() => {
      network
        .server('a.example')
        .on('blockchain.block.get_header', ([height]) => ({ result: { block_height: height, merkle_root: ROOT } }))
        .on('blockchain.transaction.get_merkle', ([, height]) => ({
          result: { block_height: height, merkle: [BRANCH], pos: 3 },
        }))
        .on('blockchain.transaction.get', ([hash]) => ({ result: `raw-${String(hash).slice(0, 4)}` }));
    });

    it('should fetch block headers in order', async () => {
      const headers = await createClient().blockHeader(100, 101);
      expect(headers).toEqual([
        { block_height: 100, merkle_root: ROOT },
        { block_height: 101, merkle_root: ROOT },
      ]);
    });

    it('should attach merkle roots with one header request per height', async () => {
      const data = await createClient().getAllMerkleData(
        { tx_hash: TX_1, height: 100 },
        { tx_hash: TX_2, height: 100 },
      );

      expect(data).toEqual([
        { block_height: 100, merkle: [BRANCH], pos: 3, merkle_root: ROOT },
        { block_height: 100, merkle: [BRANCH], pos: 3, merkle_root: ROOT },
      ]);
      expect(network.server('a.example').requests('blockchain.block.get_header')).toHaveLength(1);
      expect(network.server('a.example').requests('blockchain.transaction.get_merkle').map((r) => r.params)).toEqual([
        [TX_1, 100],
        [TX_2, 100],
      ]);
    });

    it('should return raw transaction results in order', async () => {
      const results = await createClient().getTxs(TX_1, TX_2);
      expect(results.map((result) => result.data)).toEqual(['raw-1111', 'raw-2222']);
    });

    it('should return the broadcast transaction id', async () => {
      network.server('a.example').on('blockchain.transaction.broadcast', () => ({ result: TX_1 }));
      await expect(createClient().broadcastTransaction('0200')).resolves.toBe(TX_1);
      expect(network.server('a.example').requests('blockchain.transaction.broadcast')[0]?.params).toEqual(['0200']);
    });

    it('should raise RpcError for a rejected broadcast', async () => {
      network
        .server('a.example')
        .on('blockchain.transaction.broadcast', () => ({ error: { code: 1, message: 'min relay fee not met' } }));
      await expect(createClient().broadcastTransaction('0200')).rejects.toBeInstanceOf(RpcError);
    });
  });

  describe('scripthash queries', () => {
    it('should report balances with the address and total', async () => {
      network
        .server('a.example')
        .on('blockchain.scripthash.get_balance', ([sh]) => ({
          result: sh === SH_A ? { confirmed: 1_000, unconfirmed: -200 } : { confirmed: 0, unconfirmed: 50 },
        }));

      const balances = await createClient().getBalance({ [SH_A]: 'addr-a', [SH_B]: 'addr-b' });

      expect(balances).toEqual([
        { confirmed: 1_000, unconfirmed: -200, address: 'addr-a', total: 800 },
        { confirmed: 0, unconfirmed: 50, address: 'addr-b', total: 50 },
      ]);
    });

    it('should flatten unspent outputs across scripthashes', async () => {
      network.server('a.example').on('blockchain.scripthash.listunspent', ([sh]) => ({
        result:
          sh === SH_A
            ? [
                { tx_hash: TX_1, tx_pos: 0, height: 100, value: 5_000 },
                { tx_hash: TX_2, tx_pos: 1, height: 101, value: 7_000 },
              ]
            : [],
      }));

      const outputs = await createClient().unspent({ [SH_A]: 'addr-a', [SH_B]: 'addr-b' });

      expect(outputs).toEqual([
        { tx_hash: TX_1, tx_pos: 0, height: 100, value: 5_000, address: 'addr-a' },
        { tx_hash: TX_2, tx_pos: 1, height: 101, value: 7_000, address: 'addr-a' },
      ]);
    });

    it('should tag history and mempool entries with their address', async () => {
      network
        .server('a.example')
        .on('blockchain.scripthash.get_history', () => ({ result: [{ tx_hash: TX_1, height: 100 }] }))
        .on('blockchain.scripthash.get_mempool', () => ({ result: [{ tx_hash: TX_2, height: 0, fee: 250 }] }));
      const client = createClient();

      await expect(client.history({ [SH_A]: 'addr-a' })).resolves.toEqual([
        { tx_hash: TX_1, height: 100, address: 'addr-a' },
      ]);
      await expect(client.getMempool({ [SH_B]: 'addr-b' })).resolves.toEqual([
        { tx_hash: TX_2, height: 0, fee: 250, address: 'addr-b' },
      ]);
    });

    it('should raise DataError for a malformed response', async () => {
      network
        .server('a.example')
        .on('blockchain.scripthash.get_balance', () => ({ result: { confirmed: 'lots', unconfirmed: 0 } }));

      const error = await createClient()
        .getBalance({ [SH_A]: 'addr-a' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DataError);
      expect(error).toMatchObject({ code: 'DATA_BALANCE_INVALID' });
    });
  });

  describe('fees', () => {
    it('should serve estimateFeeCached from cache within the TTL', async () => {
      const rates = [0.0002, 0.0003];
      network.server('a.example').on('blockchain.estimatefee', () => ({ result: rates.shift() }));
      const client = createClient();

      await expect(client.estimateFeeCached(6)).resolves.toBe(0.0002);
      clock += 9 * 60_000;
      await expect(client.estimateFeeCached(6)).resolves.toBe(0.0002);
      expect(network.server('a.example').requests('blockchain.estimatefee')).toHaveLength(1);

      clock += 60_000;
      await expect(client.estimateFeeCached(6)).resolves.toBe(0.0003);
      expect(network.server('a.example').requests('blockchain.estimatefee')).toHaveLength(2);
    });

    it('should always ask the server for an uncached estimate', async () => {
      network
        .server('a.example')
        .on('blockchain.estimatefee', () => ({ result: 0.0001 }))
        .on('blockchain.relayfee', () => ({ result: 0.00001 }));
      const client = createClient();

      await client.estimateFee(2);
      await client.estimateFee(2);
      await expect(client.relayFee()).resolves.toBe(0.00001);

      expect(network.server('a.example').requests('blockchain.estimatefee')).toHaveLength(2);
    });
  });

  describe('server methods', () => {
    it('should call the server info methods', async () => {
      network
        .server('a.example')
        .on('server.donation_address', () => ({ result: 'bc1qdonate' }))
        .on('server.features', () => ({ result: { server_version: 'ElectrumX 1.16.0', pruning: null } }))
        .on('server.peers.subscribe', () => ({ result: [['10.0.0.1', 'peer.example', ['v1.4', 's50002']]] }));
      const client = createClient();

      await expect(client.serverDonationAddress()).resolves.toBe('bc1qdonate');
      await expect(client.serverFeatures()).resolves.toEqual({ server_version: 'ElectrumX 1.16.0', pruning: null });
      await expect(client.subscribeToPeers()).resolves.toEqual([['10.0.0.1', 'peer.example', ['v1.4', 's50002']]]);
      await expect(client.serverVersion()).resolves.toEqual([FAKE_SERVER_SOFTWARE, '1.4']);
    });
  });

  describe('subscriptions', () => {
    it('should deliver scripthash statuses under the external id', async () => {
      network.server('a.example').on('blockchain.scripthash.subscribe', () => ({ result: null }));
      const client = createClient();
      const callback = vi.fn<ScripthashStatusCallback>();

      await client.subscribeToScripthashes({ [SH_A]: 'addr-a' }, callback);
      await flush();
      network.server('a.example').push('blockchain.scripthash.subscribe', [SH_A, STATUS]);
      await flush();

      expect(callback.mock.calls).toEqual([
        ['addr-a', null],
        ['addr-a', STATUS],
      ]);
    });

    it('should subscribe to addresses by their scripthash', async () => {
      const address = '1PMycacnJaSqwwJqjawXBErnLsZ7RkXUAs';
      const script = Buffer.from('76a914f54a5851e9372b87810a8e60cdd2e7cfd80b6e3188ac', 'hex');
      const scripthash = Buffer.from(createHash('sha256').update(script).digest()).reverse().toString('hex');
      network.server('a.example').on('blockchain.scripthash.subscribe', () => ({ result: STATUS }));
      const callback = vi.fn<ScripthashStatusCallback>();

      await createClient().subscribeToAddresses([address], callback);
      await flush();

      expect(network.server('a.example').requests('blockchain.scripthash.subscribe')[0]?.params).toEqual([scripthash]);
      expect(callback).toHaveBeenCalledWith(address, STATUS);
    });

    it('should deliver block headers', async () => {
      network.server('a.example').on('blockchain.headers.subscribe', () => ({ result: { height: 800_000, hex: '00' } }));
      const client = createClient();
      const headers: BlockHeader[] = [];

      await client.subscribeToBlockHeaders((header) => headers.push(header));
      await flush();
      network.server('a.example').push('blockchain.headers.subscribe', [{ height: 800_001, hex: '01' }]);
      await flush();

      expect(headers.map((header) => header.height)).toEqual([800_000, 800_001]);
    });

    it('should restore subscriptions on another server after a drop', async () => {
      network.server('a.example').on('blockchain.scripthash.subscribe', () => ({ result: null }));
      network.server('b.example').on('blockchain.scripthash.subscribe', () => ({ result: STATUS }));
      const client = createClient();
      const callback = vi.fn<ScripthashStatusCallback>();
      const restored = vi.fn();
      client.on(ClientEventType.SUBSCRIPTIONS_RESTORED, restored);

      await client.subscribeToScripthashes({ [SH_A]: 'addr-a' }, callback);
      await flush();
      network.server('a.example').dropConnection();
      await vi.waitFor(() => expect(callback).toHaveBeenCalledTimes(2));

      expect(client.getCurrentServer()?.host).toBe('b.example');
      expect(network.server('b.example').requests('blockchain.scripthash.subscribe')[0]?.params).toEqual([SH_A]);
      expect(callback).toHaveBeenLastCalledWith('addr-a', STATUS);
      expect(restored).toHaveBeenCalledOnce();
    });

    it('should close the client after a push carrying an error', async () => {
      network
        .server('a.example')
        .on('blockchain.scripthash.subscribe', () => ({ result: null }))
        .on('server.banner', () => ({ result: 'Welcome' }));
      const client = createClient();
      const fatal = vi.fn();
      client.on(ClientEventType.FATAL_ERROR, fatal);

      await client.subscribeToScripthashes({ [SH_A]: 'addr-a' }, vi.fn());
      await flush();
      network
        .server('a.example')
        .sendRaw('{"jsonrpc":"2.0","method":"blockchain.scripthash.subscribe","params":[],"error":{"code":-1,"message":"x"}}');
      await flush();

      expect(client.getFatalError()).toBeInstanceOf(PushProtocolViolationError);
      expect(fatal).toHaveBeenCalledOnce();
      expect(client.getState()).toBe('closed');
      expect(network.server('a.example').connection?.isOpen()).toBe(false);
      expect(network.attempts).toEqual(['a.example']);
      await expect(client.serverBanner()).rejects.toBeInstanceOf(PushProtocolViolationError);
      expect(network.server('a.example').requests('server.banner')).toHaveLength(0);
    });
  });

  describe('failover', () => {
    it('should answer from another server when the first refuses', async () => {
      network.server('a.example').refuse = true;
      network.server('b.example').on('server.banner', () => ({ result: 'from b' }));
      const client = createClient();

      await expect(client.serverBanner()).resolves.toBe('from b');
      expect(client.getFailedHosts()).toEqual([]);
    });

    it('should stop after maxServers failed hosts', async () => {
      for (const host of ['a.example', 'b.example', 'c.example']) network.server(host).refuse = true;
      const client = createClient({ maxServers: 2 });

      await expect(client.serverBanner()).rejects.toMatchObject({ code: 'FAILOVER_EXHAUSTED' });
      expect(network.attempts).toEqual(['a.example', 'b.example']);
    });
  });
});
