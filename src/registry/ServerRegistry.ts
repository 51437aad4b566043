import type { Logger } from 'pino';
import { NoServersAvailableError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ServerCatalog, ServerDescriptor, ServerEndpoint } from '../types/index.js';

export interface ServerRegistryOptions {
  /** Transport mode; decides which port a server must advertise */
  useTls: boolean;
  /** Uniform [0, 1) source, injectable for tests @default Math.random */
  random?: () => number;
  logger?: Logger;
}

/**
 * Candidate servers for one client.
 * Mutated only by removal: an entry found unusable is never re-added.
 */
export class ServerRegistry {
  private servers: Map<string, ServerDescriptor> = new Map();
  private readonly useTls: boolean;
  private random: () => number;
  private logger: Logger;

  constructor(descriptors: ServerDescriptor[], options: ServerRegistryOptions) {
    this.useTls = options.useTls;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger('registry');

    for (const descriptor of descriptors) {
      // Explicit opt-outs never enter the registry
      if (descriptor.usable) {
        this.servers.set(descriptor.host, descriptor);
      }
    }
  }

  /**
   * Builds a registry from a `{ host: { s, t, usable } }` catalog
   */
  static fromCatalog(catalog: ServerCatalog, options: ServerRegistryOptions): ServerRegistry {
    const descriptors = Object.entries(catalog).map(([host, entry]): ServerDescriptor => ({
      host,
      tlsPort: entry.s,
      plainPort: entry.t,
      usable: entry.usable ?? true,
    }));
    return new ServerRegistry(descriptors, options);
  }

  get size(): number {
    return this.servers.size;
  }

  isTls(): boolean {
    return this.useTls;
  }

  /**
   * A server is usable when it is not flagged off and advertises the port
   * for this registry's transport mode
   */
  isUsable(descriptor: ServerDescriptor): boolean {
    return descriptor.usable && this.portFor(descriptor) !== undefined;
  }

  has(host: string): boolean {
    return this.servers.has(host);
  }

  get(host: string): ServerDescriptor | undefined {
    return this.servers.get(host);
  }

  getHosts(): string[] {
    return Array.from(this.servers.keys());
  }

  remove(host: string): boolean {
    return this.servers.delete(host);
  }

  /**
   * Port to use for `host` under the current transport mode
   */
  resolvePort(host: string): number | undefined {
    const descriptor = this.servers.get(host);
    return descriptor ? this.portFor(descriptor) : undefined;
  }

  /**
   * Picks uniformly among servers not in `excluding`. A pick that lacks the
   * required port is removed for good and the pick is repeated.
   * @throws NoServersAvailableError when no candidate is left
   */
  pickRandom(excluding: ReadonlySet<string> = new Set()): ServerEndpoint {
    for (;;) {
      const candidates = this.getHosts().filter((host) => !excluding.has(host));
      if (candidates.length === 0) {
        throw new NoServersAvailableError(this.useTls, excluding.size);
      }

      const index = Math.min(Math.floor(this.random() * candidates.length), candidates.length - 1);
      const host = candidates[index];
      const descriptor = host === undefined ? undefined : this.servers.get(host);
      if (!descriptor) {
        continue;
      }

      const port = this.portFor(descriptor);
      if (port === undefined) {
        this.logger.debug({ host, tls: this.useTls }, 'Removing server without a port for this transport');
        this.servers.delete(descriptor.host);
        continue;
      }

      return { host: descriptor.host, port, useTls: this.useTls };
    }
  }

  private portFor(descriptor: ServerDescriptor): number | undefined {
    return this.useTls ? descriptor.tlsPort : descriptor.plainPort;
  }
}
