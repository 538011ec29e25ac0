import * as fs from 'fs';
import * as path from 'path';

export const DEFAULT_CONFIG_NAME = 'config';
export const CONFIG_DIR = path.join(__dirname, '..', '..', 'config');

export type CapacityTypeName = 'spot' | 'on-demand';
export type EndpointAccessName = 'private' | 'public' | 'public-and-private';
export type TaintEffectName = 'NO_SCHEDULE' | 'PREFER_NO_SCHEDULE' | 'NO_EXECUTE';

export const AMI_TYPES = [
  'AL2_ARM_64',
  'AL2_x86_64',
  'AL2023_ARM_64_STANDARD',
  'AL2023_x86_64_STANDARD',
  'BOTTLEROCKET_ARM_64',
  'BOTTLEROCKET_x86_64',
] as const;
export type AmiTypeName = (typeof AMI_TYPES)[number];

/** Versions the bundled kubectl layer and the bastion's kubectl can talk to */
export const KUBERNETES_VERSIONS = ['1.31'] as const;
export type KubernetesVersionName = (typeof KUBERNETES_VERSIONS)[number];

export interface AccountConfig {
  readonly id: string;
}

export interface CodeCommitSource {
  readonly type: 'codecommit';
  readonly repositoryName: string;
  readonly branch: string;
}

export interface ConnectionSource {
  readonly type: 'connection';
  /** `owner/repo` */
  readonly repository: string;
  readonly branch: string;
  readonly connectionArn: string;
}

export type PipelineSource = CodeCommitSource | ConnectionSource;

export interface PipelineConfig {
  /** Account label from `accounts` */
  readonly account: string;
  readonly region: string;
  readonly source: PipelineSource;
  readonly synthInstallCommands: string[];
}

export interface DeploymentTarget {
  /** Deployment phase, e.g. `dev` or `prod` */
  readonly phase: string;
  readonly account: string;
}

export interface NodeGroupTaint {
  readonly key: string;
  readonly value: string;
  readonly effect: TaintEffectName;
}

export interface NodeGroupConfig {
  readonly name: string;
  readonly instanceTypes: string[];
  readonly capacityType: CapacityTypeName;
  readonly amiType: AmiTypeName;
  readonly minSize: number;
  readonly maxSize: number;
  readonly desiredSize?: number;
  readonly labels: Record<string, string>;
  readonly taints: NodeGroupTaint[];
}

export interface AddonToggles {
  readonly ebsCsiDriver: boolean;
  readonly fluentBit: boolean;
  readonly clusterAutoscaler: boolean;
}

export interface KarpenterConfig {
  readonly enabled: boolean;
  readonly chartVersion: string;
  /** EC2NodeClass `amiSelectorTerms` alias, e.g. `al2023@latest` */
  readonly amiAlias: string;
  readonly instanceCategories: string[];
  readonly capacityTypes: CapacityTypeName[];
  readonly cpuLimit: number;
}

export interface EksConfig {
  readonly clusterName: string;
  readonly kubernetesVersion: KubernetesVersionName;
  readonly targetRegion: string;
  readonly vpcCidr: string;
  readonly maxAzs: number;
  readonly natGateways: number;
  readonly endpointAccess: EndpointAccessName;
  readonly deployments: DeploymentTarget[];
  readonly nodeGroups: NodeGroupConfig[];
  readonly addons: AddonToggles;
  readonly karpenter: KarpenterConfig;
}

export interface AdminConfig {
  readonly keyName: string;
  readonly publicKeyMaterial: string;
}

export interface AppConfig {
  readonly accounts: Record<string, AccountConfig>;
  readonly pipeline: PipelineConfig;
  readonly eks: EksConfig;
  readonly admin: AdminConfig;
}

/**
 * Raised when the configuration file is missing, malformed or inconsistent.
 * `path` points at the offending JSON key, e.g. `eks.nodeGroups[1].minSize`.
 */
export class ConfigError extends Error {
  constructor(public readonly path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = 'ConfigError';
  }
}

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function objectAt(value: unknown, at: string): JsonObject {
  if (!isObject(value)) {
    throw new ConfigError(at, 'expected an object');
  }
  return value;
}

function stringAt(value: unknown, at: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(at, 'expected a non-empty string');
  }
  return value;
}

function optionalString(value: unknown, at: string, fallback: string): string {
  return value === undefined ? fallback : stringAt(value, at);
}

function integerAt(value: unknown, at: string, min = 0): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(at, `expected an integer >= ${min}`);
  }
  return value;
}

function booleanAt(value: unknown, at: string, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigError(at, 'expected a boolean');
  }
  return value;
}

function arrayAt(value: unknown, at: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(at, 'expected an array');
  }
  return value;
}

function stringArrayAt(value: unknown, at: string): string[] {
  const items = arrayAt(value, at);
  if (items.length === 0) {
    throw new ConfigError(at, 'expected at least one entry');
  }
  return items.map((item, i) => stringAt(item, `${at}[${i}]`));
}

function oneOf<T extends string>(value: unknown, at: string, allowed: readonly T[]): T {
  const found = allowed.find((candidate) => candidate === value);
  if (found === undefined) {
    throw new ConfigError(at, `expected one of ${allowed.join(', ')}`);
  }
  return found;
}

function stringRecordAt(value: unknown, at: string): Record<string, string> {
  if (value === undefined) {
    return {};
  }
  const record = objectAt(value, at);
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(record)) {
    result[key] = stringAt(entry, `${at}.${key}`);
  }
  return result;
}

function parseAccounts(value: unknown): Record<string, AccountConfig> {
  const accounts = objectAt(value, 'accounts');
  const result: Record<string, AccountConfig> = {};
  for (const [label, entry] of Object.entries(accounts)) {
    const account = objectAt(entry, `accounts.${label}`);
    const id = stringAt(account.id, `accounts.${label}.id`);
    if (!/^\d{12}$/.test(id)) {
      throw new ConfigError(`accounts.${label}.id`, 'expected a 12-digit AWS account id');
    }
    result[label] = { id };
  }
  if (!('tooling' in result)) {
    throw new ConfigError('accounts.tooling', 'a tooling account is required');
  }
  return result;
}

function parseSource(value: unknown): PipelineSource {
  const source = objectAt(value, 'pipeline.source');
  const type = oneOf(source.type, 'pipeline.source.type', ['codecommit', 'connection'] as const);
  if (type === 'codecommit') {
    return {
      type,
      repositoryName: stringAt(source.repositoryName, 'pipeline.source.repositoryName'),
      branch: optionalString(source.branch, 'pipeline.source.branch', 'main'),
    };
  }
  const repository = stringAt(source.repository, 'pipeline.source.repository');
  if (!/^[^/\s]+\/[^/\s]+$/.test(repository)) {
    throw new ConfigError('pipeline.source.repository', 'expected owner/repo');
  }
  return {
    type,
    repository,
    branch: optionalString(source.branch, 'pipeline.source.branch', 'main'),
    connectionArn: stringAt(source.connectionArn, 'pipeline.source.connectionArn'),
  };
}

function parsePipeline(value: unknown): PipelineConfig {
  const pipeline = objectAt(value, 'pipeline');
  return {
    account: stringAt(pipeline.account, 'pipeline.account'),
    region: stringAt(pipeline.region, 'pipeline.region'),
    source: parseSource(pipeline.source),
    synthInstallCommands:
      pipeline.synthInstallCommands === undefined
        ? ['npm ci']
        : stringArrayAt(pipeline.synthInstallCommands, 'pipeline.synthInstallCommands'),
  };
}

function parseNodeGroup(value: unknown, at: string): NodeGroupConfig {
  const group = objectAt(value, at);
  const minSize = integerAt(group.minSize, `${at}.minSize`);
  const maxSize = integerAt(group.maxSize, `${at}.maxSize`, 1);
  const desiredSize =
    group.desiredSize === undefined ? undefined : integerAt(group.desiredSize, `${at}.desiredSize`);
  if (minSize > maxSize) {
    throw new ConfigError(`${at}.minSize`, `must not exceed maxSize (${maxSize})`);
  }
  if (desiredSize !== undefined && (desiredSize < minSize || desiredSize > maxSize)) {
    throw new ConfigError(`${at}.desiredSize`, `must lie between ${minSize} and ${maxSize}`);
  }
  const taints = group.taints === undefined ? [] : arrayAt(group.taints, `${at}.taints`);
  return {
    name: stringAt(group.name, `${at}.name`),
    instanceTypes: stringArrayAt(group.instanceTypes, `${at}.instanceTypes`),
    capacityType: oneOf(group.capacityType, `${at}.capacityType`, ['spot', 'on-demand'] as const),
    amiType: oneOf(group.amiType, `${at}.amiType`, AMI_TYPES),
    minSize,
    maxSize,
    desiredSize,
    labels: stringRecordAt(group.labels, `${at}.labels`),
    taints: taints.map((entry, i) => {
      const taintAt = `${at}.taints[${i}]`;
      const taint = objectAt(entry, taintAt);
      return {
        key: stringAt(taint.key, `${taintAt}.key`),
        value: stringAt(taint.value, `${taintAt}.value`),
        effect: oneOf(taint.effect, `${taintAt}.effect`, [
          'NO_SCHEDULE',
          'PREFER_NO_SCHEDULE',
          'NO_EXECUTE',
        ] as const),
      };
    }),
  };
}

function parseKarpenter(value: unknown): KarpenterConfig {
  const karpenter: JsonObject = value === undefined ? {} : objectAt(value, 'eks.karpenter');
  return {
    enabled: booleanAt(karpenter.enabled, 'eks.karpenter.enabled', true),
    chartVersion: optionalString(karpenter.chartVersion, 'eks.karpenter.chartVersion', '1.0.0'),
    amiAlias: optionalString(karpenter.amiAlias, 'eks.karpenter.amiAlias', 'al2023@latest'),
    instanceCategories:
      karpenter.instanceCategories === undefined
        ? ['c', 'm', 'r']
        : stringArrayAt(karpenter.instanceCategories, 'eks.karpenter.instanceCategories'),
    capacityTypes:
      karpenter.capacityTypes === undefined
        ? ['spot', 'on-demand']
        : stringArrayAt(karpenter.capacityTypes, 'eks.karpenter.capacityTypes').map((entry, i) =>
            oneOf(entry, `eks.karpenter.capacityTypes[${i}]`, ['spot', 'on-demand'] as const),
          ),
    cpuLimit:
      karpenter.cpuLimit === undefined ? 100 : integerAt(karpenter.cpuLimit, 'eks.karpenter.cpuLimit', 1),
  };
}

function parseEks(value: unknown): EksConfig {
  const eks = objectAt(value, 'eks');
  const deployments = arrayAt(eks.deployments, 'eks.deployments').map((entry, i) => {
    const deployment = objectAt(entry, `eks.deployments[${i}]`);
    return {
      phase: stringAt(deployment.phase, `eks.deployments[${i}].phase`),
      account: stringAt(deployment.account, `eks.deployments[${i}].account`),
    };
  });
  if (deployments.length === 0) {
    throw new ConfigError('eks.deployments', 'expected at least one deployment');
  }
  // Stage names are derived from the phase
  const phases = new Set<string>();
  deployments.forEach((deployment, i) => {
    if (phases.has(deployment.phase)) {
      throw new ConfigError(`eks.deployments[${i}].phase`, `duplicate deployment phase ${deployment.phase}`);
    }
    phases.add(deployment.phase);
  });
  const nodeGroups = arrayAt(eks.nodeGroups, 'eks.nodeGroups').map((entry, i) =>
    parseNodeGroup(entry, `eks.nodeGroups[${i}]`),
  );
  const seen = new Set<string>();
  nodeGroups.forEach((group, i) => {
    if (seen.has(group.name)) {
      throw new ConfigError(`eks.nodeGroups[${i}].name`, `duplicate node group name ${group.name}`);
    }
    seen.add(group.name);
  });
  const addons: JsonObject = eks.addons === undefined ? {} : objectAt(eks.addons, 'eks.addons');
  return {
    clusterName: stringAt(eks.clusterName, 'eks.clusterName'),
    kubernetesVersion:
      eks.kubernetesVersion === undefined
        ? '1.31'
        : oneOf(eks.kubernetesVersion, 'eks.kubernetesVersion', KUBERNETES_VERSIONS),
    targetRegion: stringAt(eks.targetRegion, 'eks.targetRegion'),
    vpcCidr: optionalString(eks.vpcCidr, 'eks.vpcCidr', '10.0.0.0/16'),
    maxAzs: eks.maxAzs === undefined ? 2 : integerAt(eks.maxAzs, 'eks.maxAzs', 1),
    natGateways: eks.natGateways === undefined ? 1 : integerAt(eks.natGateways, 'eks.natGateways'),
    endpointAccess:
      eks.endpointAccess === undefined
        ? 'private'
        : oneOf(eks.endpointAccess, 'eks.endpointAccess', ['private', 'public', 'public-and-private'] as const),
    deployments,
    nodeGroups,
    addons: {
      ebsCsiDriver: booleanAt(addons.ebsCsiDriver, 'eks.addons.ebsCsiDriver', false),
      fluentBit: booleanAt(addons.fluentBit, 'eks.addons.fluentBit', false),
      clusterAutoscaler: booleanAt(addons.clusterAutoscaler, 'eks.addons.clusterAutoscaler', false),
    },
    karpenter: parseKarpenter(eks.karpenter),
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    Object.values(value).forEach((entry) => deepFreeze(entry));
    Object.freeze(value);
  }
  return value;
}

/**
 * Validates a parsed JSON document and returns the typed configuration.
 */
export function parseConfig(raw: unknown): AppConfig {
  const root = objectAt(raw, '$');
  const admin = objectAt(root.admin, 'admin');
  const config: AppConfig = {
    accounts: parseAccounts(root.accounts),
    pipeline: parsePipeline(root.pipeline),
    eks: parseEks(root.eks),
    admin: {
      keyName: stringAt(admin.keyName, 'admin.keyName'),
      publicKeyMaterial: stringAt(admin.publicKeyMaterial, 'admin.publicKeyMaterial'),
    },
  };

  if (!(config.pipeline.account in config.accounts)) {
    throw new ConfigError('pipeline.account', `unknown account label ${config.pipeline.account}`);
  }
  config.eks.deployments.forEach((deployment, i) => {
    if (!(deployment.account in config.accounts)) {
      throw new ConfigError(`eks.deployments[${i}].account`, `unknown account label ${deployment.account}`);
    }
  });

  return deepFreeze(config);
}

export function resolveConfigPath(
  name: string = process.env.CDK_APP_CONFIG ?? DEFAULT_CONFIG_NAME,
  dir: string = CONFIG_DIR,
): string {
  return path.join(dir, `${name}.json`);
}

export function loadConfig(filePath: string = resolveConfigPath()): AppConfig {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new ConfigError(filePath, `cannot read configuration file (${String(err)})`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (err) {
    throw new ConfigError(filePath, `invalid JSON (${String(err)})`);
  }
  return parseConfig(raw);
}
