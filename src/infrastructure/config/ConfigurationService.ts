import { readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Logger } from 'pino';
import { CLIENT_NAME, DEFAULT_MAX_SERVERS, PROTOCOL_VERSION } from '../../rpc/types.js';
import { DEFAULT_TIMEOUT_CONFIG } from '../../resilience/TimeoutManager.js';
import { DataError, ValidationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type {
  BitcoinNetworkName,
  ProtocolVersionRange,
  ServerCatalog,
  ServerEndpoint,
} from '../../types/index.js';

export interface ElectrumClientConfig {
  useTls: boolean;
  /** Per-request response timeout (ms) */
  timeoutMs: number;
  connectTimeoutMs: number;
  /** Distinct hosts per failover sequence */
  maxServers: number;
  clientName: string;
  protocolVersion: ProtocolVersionRange;
  /** Preferred first server */
  host?: string;
  port?: number;
  /** Catalog file name under servers/, or an absolute path */
  serverFile?: string;
  /** Inline catalog; takes precedence over `serverFile` */
  servers?: ServerCatalog;
  allowSelfSignedCert: boolean;
  network: BitcoinNetworkName;
}

export const DEFAULT_TLS_PORT = 50002;
export const DEFAULT_TCP_PORT = 50001;

const SERVERS_DIR = fileURLToPath(new URL('../../../servers/', import.meta.url));

const DEFAULT_SERVER_FILES: Record<BitcoinNetworkName, string | undefined> = {
  bitcoin: 'bitcoin.json',
  testnet: 'testnet.json',
  regtest: undefined,
};

const PortSchema = z
  .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().min(1).max(65_535));

const VersionSchema = z.string().regex(/^\d+(\.\d+)*$/, 'Expected a dotted version number');

export const CatalogEntrySchema = z.object({
  s: PortSchema.optional(),
  t: PortSchema.optional(),
  usable: z.boolean().optional(),
  pruning: z.string().optional(),
  version: z.string().optional(),
});

export const ServerCatalogSchema = z.record(z.string().min(1), CatalogEntrySchema);

const ConfigSchema = z.object({
  useTls: z.boolean(),
  timeoutMs: z.number().int().positive(),
  connectTimeoutMs: z.number().int().positive(),
  maxServers: z.number().int().positive(),
  clientName: z.string().min(1),
  protocolVersion: z.tuple([VersionSchema, VersionSchema]).readonly(),
  host: z.string().min(1).optional(),
  port: PortSchema.optional(),
  serverFile: z.string().min(1).optional(),
  allowSelfSignedCert: z.boolean(),
  network: z.enum(['bitcoin', 'testnet', 'regtest']),
});

export interface ConfigurationServiceOptions {
  /** @default process.env */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Client configuration: defaults, then ELECTRUM_* environment variables,
 * then explicit overrides. The server catalog is loaded once on creation.
 */
export class ConfigurationService {
  private config: ElectrumClientConfig;
  private catalog: ServerCatalog;
  private env: NodeJS.ProcessEnv;
  private logger: Logger;

  constructor(overrides: Partial<ElectrumClientConfig> = {}, options: ConfigurationServiceOptions = {}) {
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? createLogger('config');
    this.config = this.loadConfiguration(overrides);
    this.catalog = this.loadCatalog();
  }

  private loadConfiguration(overrides: Partial<ElectrumClientConfig>): ElectrumClientConfig {
    const defaultConfig: ElectrumClientConfig = {
      useTls: true,
      timeoutMs: DEFAULT_TIMEOUT_CONFIG.request,
      connectTimeoutMs: DEFAULT_TIMEOUT_CONFIG.connection,
      maxServers: DEFAULT_MAX_SERVERS,
      clientName: CLIENT_NAME,
      protocolVersion: [PROTOCOL_VERSION, PROTOCOL_VERSION],
      allowSelfSignedCert: true,
      network: 'bitcoin',
    };

    const merged: ElectrumClientConfig = {
      ...defaultConfig,
      ...this.loadFromEnvironment(),
      ...overrides,
    };

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue ? String(issue.path[0] ?? 'config') : 'config';
      const received = issue?.path[0] !== undefined ? this.fieldValue(merged, field) : merged;
      throw ValidationError.invalidParameter(field, issue?.message ?? 'valid configuration', received);
    }

    return { ...parsed.data, servers: merged.servers };
  }

  private loadFromEnvironment(): Partial<ElectrumClientConfig> {
    const env = this.env;
    const config: Partial<ElectrumClientConfig> = {};

    const useTls = this.readBoolean('ELECTRUM_USE_TLS');
    if (useTls !== undefined) config.useTls = useTls;

    const timeoutMs = this.readInteger('ELECTRUM_TIMEOUT_MS');
    if (timeoutMs !== undefined) config.timeoutMs = timeoutMs;

    const connectTimeoutMs = this.readInteger('ELECTRUM_CONNECT_TIMEOUT_MS');
    if (connectTimeoutMs !== undefined) config.connectTimeoutMs = connectTimeoutMs;

    const maxServers = this.readInteger('ELECTRUM_MAX_SERVERS');
    if (maxServers !== undefined) config.maxServers = maxServers;

    if (env.ELECTRUM_CLIENT_NAME) {
      config.clientName = env.ELECTRUM_CLIENT_NAME;
    }

    if (env.ELECTRUM_PROTOCOL_MIN || env.ELECTRUM_PROTOCOL_MAX) {
      const min = env.ELECTRUM_PROTOCOL_MIN || PROTOCOL_VERSION;
      config.protocolVersion = [min, env.ELECTRUM_PROTOCOL_MAX || min];
    }

    if (env.ELECTRUM_HOST) {
      config.host = env.ELECTRUM_HOST;
    }

    const port = this.readInteger('ELECTRUM_PORT');
    if (port !== undefined) config.port = port;

    if (env.ELECTRUM_SERVER_FILE) {
      config.serverFile = env.ELECTRUM_SERVER_FILE;
    }

    if (env.ELECTRUM_NETWORK) {
      const network = env.ELECTRUM_NETWORK;
      if (network !== 'bitcoin' && network !== 'testnet' && network !== 'regtest') {
        throw ValidationError.invalidParameter('ELECTRUM_NETWORK', 'bitcoin, testnet or regtest', network);
      }
      config.network = network;
    }

    const allowSelfSigned = this.readBoolean('ELECTRUM_ALLOW_SELF_SIGNED');
    if (allowSelfSigned !== undefined) config.allowSelfSignedCert = allowSelfSigned;

    return config;
  }

  private loadCatalog(): ServerCatalog {
    if (this.config.servers) {
      const parsed = ServerCatalogSchema.safeParse(this.config.servers);
      if (!parsed.success) {
        throw DataError.schemaViolation('CATALOG', parsed.error.message, this.config.servers);
      }
      return parsed.data;
    }

    const file = this.config.serverFile ?? DEFAULT_SERVER_FILES[this.config.network];
    if (!file) {
      return {};
    }
    return this.readCatalogFile(this.resolveServerFile(file));
  }

  /**
   * Relative names resolve against the bundled servers/ directory
   */
  resolveServerFile(file: string): string {
    return isAbsolute(file) ? file : resolve(SERVERS_DIR, file);
  }

  private readCatalogFile(path: string): ServerCatalog {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
      this.logger.error({ err: error, path }, 'Could not read server catalog; using an empty one');
      return {};
    }

    const parsed = ServerCatalogSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.error({ path, issues: parsed.error.issues }, 'Invalid server catalog; using an empty one');
      return {};
    }

    this.logger.debug({ path, servers: Object.keys(parsed.data).length }, 'Server catalog loaded');
    return parsed.data;
  }

  private readInteger(name: string): number | undefined {
    const raw = this.env[name];
    if (raw === undefined || raw === '') return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      throw ValidationError.invalidParameter(name, 'integer', raw);
    }
    return value;
  }

  private readBoolean(name: string): boolean | undefined {
    const raw = this.env[name];
    if (raw === undefined || raw === '') return undefined;
    switch (raw.toLowerCase()) {
      case 'true':
      case '1':
      case 'yes':
        return true;
      case 'false':
      case '0':
      case 'no':
        return false;
      default:
        throw ValidationError.invalidParameter(name, 'boolean', raw);
    }
  }

  private fieldValue(config: ElectrumClientConfig, field: string): unknown {
    return Object.entries(config).find(([key]) => key === field)?.[1];
  }

  getConfig(): Readonly<ElectrumClientConfig> {
    return this.config;
  }

  getCatalog(): ServerCatalog {
    return this.catalog;
  }

  getTimeouts(): { connection: number; request: number } {
    return { connection: this.config.connectTimeoutMs, request: this.config.timeoutMs };
  }

  /**
   * First server to try, when a host is configured.
   * Port: explicit setting, then the catalog entry, then the protocol default.
   */
  getPreferredEndpoint(): ServerEndpoint | undefined {
    const { host, port, useTls } = this.config;
    if (!host) return undefined;

    const entry = this.catalog[host];
    const catalogPort = useTls ? entry?.s : entry?.t;
    return {
      host,
      port: port ?? catalogPort ?? (useTls ? DEFAULT_TLS_PORT : DEFAULT_TCP_PORT),
      useTls,
    };
  }

  /**
   * Updates configuration and reloads the catalog
   */
  updateConfig(updates: Partial<ElectrumClientConfig>): void {
    this.config = this.loadConfiguration({ ...this.config, ...updates });
    this.catalog = this.loadCatalog();
  }
}
