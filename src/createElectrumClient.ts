import { ElectrumClient } from './client/ElectrumClient.js';
import type { ElectrumClientOptions } from './client/ElectrumClient.js';

/**
 * Creates a client and opens its first session.
 * Rejects with the terminal error when no server can be reached; the
 * client is closed in that case.
 */
export async function createElectrumClient(options: ElectrumClientOptions = {}): Promise<ElectrumClient> {
  const client = new ElectrumClient(options);
  try {
    await client.connect();
  } catch (error) {
    await client.close();
    throw error;
  }
  return client;
}
