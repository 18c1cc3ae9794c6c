import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { ActuationScope, FloatingIpId } from '../types';
import { ConfigurationError, toError } from '../common/errors';
import { LoggingConfig, Logger, createLogger } from '../common/logger';
import { isRecord, nonBlank } from '../common/utils';
import { ActuationOptions } from '../actuation/types';
import { TcpPeerProbe, TcpPeerProbeOptions } from '../membership/PeerProbe';
import { SerfMembershipSource, SerfMembershipSourceOptions } from '../membership/SerfMembershipSource';
import { PoolEntry } from '../failover/FailoverDecisionEngine';
import { FailoverCoordinatorOptions } from '../failover/FailoverCoordinator';

/**
 * YAML failover configuration schema, one file per instance
 */
export interface FailoverYamlConfig {
  cluster: {
    name: string;
    /** Cluster size quorum is computed against; defaults to the number of floating IPs */
    expected_size?: number;
    /** Gossip role tag of participating members */
    role: string;
  };

  instance: {
    id: string;
    zone?: string;
    default_floating_ip?: string;
  };

  floating_ips: Array<{
    /** Provider allocation id of the floating IP */
    id: string;
    zone?: string;
    default_owner?: string;
  }>;

  failover: {
    max_ips_per_instance?: number;
    actuation_scope?: ActuationScope;
    /** Full membership resync period (ms), 0 disables */
    resync_interval?: number;
    /** Probe failed peers before acting on a failure */
    confirm_failures?: boolean;
  };

  actuation: {
    timeout?: number;
    max_attempts?: number;
    base_delay?: number;
    max_delay?: number;
  };

  probe: {
    port?: number;
    attempts?: number;
    timeout?: number;
  };

  logging: {
    engine?: boolean;
    membership?: boolean;
    actuation?: boolean;
  };
}

type RawConfig = Record<string, unknown>;

const DEFAULT_ROLE = 'eip';
const ACTUATION_SCOPES: ReadonlySet<string> = new Set(['cluster', 'self']);

/**
 * Loads the per-instance failover configuration with environment-specific
 * overrides layered on top
 */
export class FailoverConfiguration extends EventEmitter {
  private raw: RawConfig | null = null;
  private config: FailoverYamlConfig | null = null;
  private configPath: string | null = null;
  private currentEnvironment: string;

  constructor(environment: string = 'development') {
    super();
    this.currentEnvironment = environment;
  }

  /**
   * Load configuration from YAML file
   */
  async loadFromFile(filePath: string): Promise<void> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      this.load(yamlContent, filePath);
      this.configPath = filePath;
      this.emit('config-loaded', { filePath, config: this.config });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new ConfigurationError(
        `Failed to load failover configuration from ${filePath}: ${toError(error).message}`,
        filePath
      );
    }
  }

  /**
   * Load configuration from a YAML string
   */
  loadFromString(yamlContent: string): void {
    this.load(yamlContent);
    this.emit('config-loaded', { config: this.config });
  }

  /**
   * Parse and validate YAML content, without environment overrides
   */
  parseFromYaml(yamlContent: string, source?: string): FailoverYamlConfig {
    return validateConfiguration(parseRaw(yamlContent, source), source);
  }

  getConfig(): FailoverYamlConfig | null {
    return this.config;
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  /**
   * Set environment for configuration overrides
   */
  setEnvironment(environment: string): void {
    this.currentEnvironment = environment;
    if (this.raw) {
      this.config = this.resolve(this.raw, this.configPath ?? undefined);
    }
  }

  /**
   * Zone → floating IP, for members that only advertise their zone
   */
  zoneMap(): Record<string, FloatingIpId> {
    const zones: Record<string, FloatingIpId> = {};
    for (const ip of this.requireConfig().floating_ips) {
      if (ip.zone) {
        zones[ip.zone] = ip.id;
      }
    }
    return zones;
  }

  pool(): PoolEntry[] {
    return this.requireConfig().floating_ips.map(ip => ({ ipId: ip.id, defaultOwner: ip.default_owner }));
  }

  /**
   * The floating IP this instance owns by default: explicit, else its zone's
   */
  selfDefaultIp(): FloatingIpId | undefined {
    const { instance } = this.requireConfig();
    if (instance.default_floating_ip) {
      return instance.default_floating_ip;
    }
    const zones = this.zoneMap();
    if (instance.zone && Object.prototype.hasOwnProperty.call(zones, instance.zone)) {
      return zones[instance.zone];
    }
    return undefined;
  }

  membershipRole(): string {
    return this.requireConfig().cluster.role;
  }

  /**
   * Serf-backed membership source limited to members carrying the configured role
   */
  createSerfSource(
    options: Partial<SerfMembershipSourceOptions> = {},
    logger: Logger = this.createInstanceLogger()
  ): SerfMembershipSource {
    return new SerfMembershipSource({ ...options, role: this.membershipRole() }, logger);
  }

  loggingConfig(): LoggingConfig {
    const { logging } = this.requireConfig();
    return {
      enableEngineLogs: logging.engine,
      enableMembershipLogs: logging.membership,
      enableActuationLogs: logging.actuation
    };
  }

  /**
   * Logger with the configured channels, prefixed with this instance's id
   */
  createInstanceLogger(): Logger {
    return createLogger({ ...this.loggingConfig(), prefix: this.requireConfig().instance.id });
  }

  actuationOptions(): Partial<ActuationOptions> {
    const { actuation } = this.requireConfig();
    const options: Partial<ActuationOptions> = {};
    if (actuation.timeout !== undefined) options.timeout = actuation.timeout;
    if (actuation.max_attempts !== undefined) options.maxAttempts = actuation.max_attempts;
    if (actuation.base_delay !== undefined) options.baseDelay = actuation.base_delay;
    if (actuation.max_delay !== undefined) options.maxDelay = actuation.max_delay;
    return options;
  }

  probeOptions(): Partial<TcpPeerProbeOptions> {
    const { probe } = this.requireConfig();
    const options: Partial<TcpPeerProbeOptions> = {};
    if (probe.port !== undefined) options.port = probe.port;
    if (probe.attempts !== undefined) options.attempts = probe.attempts;
    if (probe.timeout !== undefined) options.timeout = probe.timeout;
    return options;
  }

  /**
   * Runtime options for a FailoverCoordinator
   */
  toCoordinatorOptions(logger: Logger = this.createInstanceLogger()): FailoverCoordinatorOptions {
    const config = this.requireConfig();
    const { failover } = config;

    return {
      selfId: config.instance.id,
      clusterName: config.cluster.name,
      selfDefaultIp: this.selfDefaultIp(),
      zoneIps: this.zoneMap(),
      expectedSize: config.cluster.expected_size ?? config.floating_ips.length,
      pool: this.pool(),
      policy: failover.max_ips_per_instance !== undefined
        ? { maxIpsPerInstance: failover.max_ips_per_instance }
        : undefined,
      actuationScope: failover.actuation_scope,
      resyncIntervalMs: failover.resync_interval,
      actuation: this.actuationOptions(),
      probe: failover.confirm_failures ? new TcpPeerProbe(this.probeOptions(), logger) : undefined,
      logger
    };
  }

  /**
   * Merge configurations with precedence; the floating IP list is replaced, not merged
   */
  static mergeConfigurations(base: RawConfig, override: RawConfig): RawConfig {
    const merged: RawConfig = { ...base };
    for (const [key, value] of Object.entries(override)) {
      const current = merged[key];
      merged[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
    }
    return merged;
  }

  private load(yamlContent: string, source?: string): void {
    const raw = parseRaw(yamlContent, source);
    this.config = this.resolve(raw, source);
    this.raw = raw;
  }

  private resolve(raw: RawConfig, source?: string): FailoverYamlConfig {
    const environments = raw.environments;
    if (environments !== undefined && !isRecord(environments)) {
      throw new ConfigurationError('environments must be a mapping', source);
    }

    const override = environments?.[this.currentEnvironment];
    if (override === undefined) {
      return validateConfiguration(raw, source);
    }
    if (!isRecord(override)) {
      throw new ConfigurationError(`environments.${this.currentEnvironment} must be a mapping`, source);
    }
    return validateConfiguration(FailoverConfiguration.mergeConfigurations(raw, override), source);
  }

  private requireConfig(): FailoverYamlConfig {
    if (!this.config) {
      throw new ConfigurationError('No configuration loaded');
    }
    return this.config;
  }
}

function parseRaw(yamlContent: string, source?: string): RawConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse YAML configuration: ${toError(error).message}`, source);
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError('Configuration must be a YAML mapping', source);
  }
  return parsed;
}

/**
 * Validate configuration structure and narrow it to the typed schema
 */
export function validateConfiguration(raw: RawConfig, source?: string): FailoverYamlConfig {
  const fields = new FieldReader(source);

  const cluster = fields.section(raw, 'cluster', true);
  const instance = fields.section(raw, 'instance', true);
  const failover = fields.section(raw, 'failover');
  const actuation = fields.section(raw, 'actuation');
  const probe = fields.section(raw, 'probe');
  const logging = fields.section(raw, 'logging');

  if (!Array.isArray(raw.floating_ips) || raw.floating_ips.length === 0) {
    throw new ConfigurationError('floating_ips array is required and must not be empty', source);
  }

  const seenIds = new Set<string>();
  const seenZones = new Set<string>();
  const floatingIps: FailoverYamlConfig['floating_ips'] = raw.floating_ips.map((entry: unknown, index: number) => {
    const path = `floating_ips[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigurationError(`${path} must be a mapping`, source);
    }
    const id = fields.requiredString(entry, 'id', path);
    if (seenIds.has(id)) {
      throw new ConfigurationError(`${path}.id duplicates floating IP ${id}`, source);
    }
    seenIds.add(id);

    const zone = fields.string(entry, 'zone', path);
    if (zone !== undefined) {
      if (seenZones.has(zone)) {
        throw new ConfigurationError(`${path}.zone ${zone} is already mapped to another floating IP`, source);
      }
      seenZones.add(zone);
    }

    return {
      id,
      zone,
      default_owner: fields.string(entry, 'default_owner', path)
    };
  });

  const scope = fields.string(failover, 'actuation_scope', 'failover');
  if (scope !== undefined && !isActuationScope(scope)) {
    throw new ConfigurationError(`failover.actuation_scope must be "cluster" or "self", got "${scope}"`, source);
  }

  const defaultIp = fields.string(instance, 'default_floating_ip', 'instance');
  if (defaultIp !== undefined && !seenIds.has(defaultIp)) {
    throw new ConfigurationError(`instance.default_floating_ip ${defaultIp} is not listed in floating_ips`, source);
  }

  return {
    cluster: {
      name: fields.requiredString(cluster, 'name', 'cluster'),
      expected_size: fields.integer(cluster, 'expected_size', 'cluster', 1),
      role: fields.string(cluster, 'role', 'cluster') ?? DEFAULT_ROLE
    },
    instance: {
      id: fields.requiredString(instance, 'id', 'instance'),
      zone: fields.string(instance, 'zone', 'instance'),
      default_floating_ip: defaultIp
    },
    floating_ips: floatingIps,
    failover: {
      max_ips_per_instance: fields.integer(failover, 'max_ips_per_instance', 'failover', 1),
      actuation_scope: scope,
      resync_interval: fields.integer(failover, 'resync_interval', 'failover', 0),
      confirm_failures: fields.boolean(failover, 'confirm_failures', 'failover')
    },
    actuation: {
      timeout: fields.integer(actuation, 'timeout', 'actuation', 1),
      max_attempts: fields.integer(actuation, 'max_attempts', 'actuation', 1),
      base_delay: fields.integer(actuation, 'base_delay', 'actuation', 0),
      max_delay: fields.integer(actuation, 'max_delay', 'actuation', 0)
    },
    probe: {
      port: fields.integer(probe, 'port', 'probe', 1),
      attempts: fields.integer(probe, 'attempts', 'probe', 1),
      timeout: fields.integer(probe, 'timeout', 'probe', 1)
    },
    logging: {
      engine: fields.boolean(logging, 'engine', 'logging'),
      membership: fields.boolean(logging, 'membership', 'logging'),
      actuation: fields.boolean(logging, 'actuation', 'logging')
    }
  };
}

function isActuationScope(value: string): value is ActuationScope {
  return ACTUATION_SCOPES.has(value);
}

class FieldReader {
  constructor(private readonly source?: string) {}

  section(parent: RawConfig, key: string, required = false, path?: string): RawConfig {
    const value = parent[key];
    const name = path ? `${path}.${key}` : key;
    if (value === undefined || value === null) {
      if (required) {
        throw new ConfigurationError(`${name} is required`, this.source);
      }
      return {};
    }
    if (!isRecord(value)) {
      throw new ConfigurationError(`${name} must be a mapping`, this.source);
    }
    return value;
  }

  string(parent: RawConfig, key: string, path: string): string | undefined {
    const value = parent[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    const text = typeof value === 'number' ? String(value) : nonBlank(value);
    if (text === undefined) {
      throw new ConfigurationError(`${path}.${key} must be a non-empty string`, this.source);
    }
    return text;
  }

  requiredString(parent: RawConfig, key: string, path: string): string {
    const value = this.string(parent, key, path);
    if (value === undefined) {
      throw new ConfigurationError(`${path}.${key} is required`, this.source);
    }
    return value;
  }

  integer(parent: RawConfig, key: string, path: string, min: number): number | undefined {
    const value = parent[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
      throw new ConfigurationError(`${path}.${key} must be an integer >= ${min}`, this.source);
    }
    return value;
  }

  boolean(parent: RawConfig, key: string, path: string): boolean | undefined {
    const value = parent[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw new ConfigurationError(`${path}.${key} must be true or false`, this.source);
    }
    return value;
  }
}
