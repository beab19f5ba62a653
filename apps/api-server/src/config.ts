import { z } from 'zod';
import { DEFAULT_EXTERNAL_IP_SERVICES } from '@aph/secretvm';
import type { ParseStrategy, VmConfig } from '@aph/types';

export const DEFAULT_QUOTE_PARSE_SERVICE_URL = 'https://pccs.scrtlabs.com/dcap-tools/quote-parse';

const port = z.coerce.number().int().min(1).max(65_535);
const positiveInt = z.coerce.number().int().positive();
const strategyKind = z.enum(['rest-delegate', 'byte-offset']);

const envSchema = z.object({
  PORT: port.default(3000),
  TEE_PROVIDER: z.enum(['secretvm', 'simulator']).default('secretvm'),
  SELF_VM_ID: z.string().min(1).default('secretgpt'),
  PEER_VM_ID: z.string().min(1).default('secretai'),
  ATTESTATION_PORT: port.default(29343),
  ATTESTATION_PATH: z.string().startsWith('/').default('/cpu.html'),
  ATTESTATION_TIMEOUT_MS: positiveInt.default(30_000),
  GATEWAY_HOSTNAME: z.string().min(1).default('host.docker.internal'),
  EXTERNAL_IP_SERVICES: z
    .string()
    .optional()
    .transform((v) => (v ? v.split(',').map((s) => s.trim()).filter(Boolean) : [...DEFAULT_EXTERNAL_IP_SERVICES]))
    .pipe(z.array(z.string().url())),
  QUOTE_PARSE_STRATEGY: strategyKind.default('rest-delegate'),
  QUOTE_PARSE_SERVICE_URL: z.string().url().default(DEFAULT_QUOTE_PARSE_SERVICE_URL),
  QUOTE_PARSE_TIMEOUT_MS: positiveInt.default(10_000),
  CACHE_TTL_SECONDS: positiveInt.default(300),
  CACHE_MAX_SIZE: positiveInt.default(1000),
  CACHE_SWEEP_SECONDS: z.coerce.number().int().min(0).default(0),
  PROOF_KDF_ITERATIONS: z.coerce.number().int().min(1_000).max(10_000_000).default(600_000),
  PROOF_MIN_PASSWORD_LENGTH: positiveInt.default(8),
  BASELINES_PATH: z.string().min(1).default('config/baselines.json'),
});

export interface AppConfig {
  readonly port: number;
  readonly teeProvider: 'secretvm' | 'simulator';
  readonly vms: readonly VmConfig[];
  readonly discovery: {
    readonly port: number;
    readonly path: string;
    readonly gatewayHostname: string;
    readonly externalIpServices: readonly string[];
  };
  readonly cache: { readonly ttlMs: number; readonly maxSize: number; readonly sweepMs: number };
  readonly proof: { readonly iterations: number; readonly minPasswordLength: number };
  readonly baselinesPath: string;
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
}

/** `secret-ai` → `SECRET_AI`, for per-VM variables such as ATTESTATION_ENDPOINT_SECRET_AI. */
export function envSuffix(vmIdentity: string): string {
  return vmIdentity.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

type Env = Readonly<Record<string, string | undefined>>;

function vmConfig(
  identity: string,
  role: VmConfig['role'],
  env: Env,
  base: z.infer<typeof envSchema>,
  issues: string[],
): VmConfig {
  const suffix = envSuffix(identity);
  const endpointKey = `ATTESTATION_ENDPOINT_${suffix}`;
  const strategyKey = `QUOTE_PARSE_STRATEGY_${suffix}`;

  const endpoint = z.string().url().optional().safeParse(env[endpointKey] || undefined);
  if (!endpoint.success) issues.push(`${endpointKey}: must be a URL`);

  const kind = strategyKind.default(base.QUOTE_PARSE_STRATEGY).safeParse(env[strategyKey] || undefined);
  if (!kind.success) issues.push(`${strategyKey}: must be rest-delegate or byte-offset`);

  const parseStrategy: ParseStrategy =
    kind.success && kind.data === 'byte-offset'
      ? { kind: 'byte-offset' }
      : { kind: 'rest-delegate', serviceUrl: base.QUOTE_PARSE_SERVICE_URL, timeoutMs: base.QUOTE_PARSE_TIMEOUT_MS };

  return {
    identity,
    role,
    ...(endpoint.success && endpoint.data ? { endpoint: endpoint.data } : {}),
    parseStrategy,
    timeoutMs: base.ATTESTATION_TIMEOUT_MS,
  };
}

/** Read and validate configuration from the environment; throws ConfigError listing every problem. */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const base = parsed.data;

  if (base.SELF_VM_ID === base.PEER_VM_ID) {
    throw new ConfigError(['PEER_VM_ID: must differ from SELF_VM_ID']);
  }
  const issues: string[] = [];
  const vms = [
    vmConfig(base.SELF_VM_ID, 'self', env, base, issues),
    vmConfig(base.PEER_VM_ID, 'peer', env, base, issues),
  ];
  if (issues.length > 0) throw new ConfigError(issues);

  return {
    port: base.PORT,
    teeProvider: base.TEE_PROVIDER,
    vms,
    discovery: {
      port: base.ATTESTATION_PORT,
      path: base.ATTESTATION_PATH,
      gatewayHostname: base.GATEWAY_HOSTNAME,
      externalIpServices: base.EXTERNAL_IP_SERVICES,
    },
    cache: {
      ttlMs: base.CACHE_TTL_SECONDS * 1000,
      maxSize: base.CACHE_MAX_SIZE,
      sweepMs: base.CACHE_SWEEP_SECONDS * 1000,
    },
    proof: {
      iterations: base.PROOF_KDF_ITERATIONS,
      minPasswordLength: base.PROOF_MIN_PASSWORD_LENGTH,
    },
    baselinesPath: base.BASELINES_PATH,
  };
}
