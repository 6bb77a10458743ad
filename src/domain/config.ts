/**
 * Validated configuration model.
 *
 * The orchestrator receives a frozen SyncConfig built once by the config
 * validator; nothing downstream re-validates or reads ambient settings.
 */

/**
 * Captcha cookie/challenge settings for one service. The cookie is signed
 * with the per-service secret the engine generates (`ServiceState.captchaSecret`);
 * the challenge provider's own verification secret belongs to whatever serves
 * the challenge page, not to the edge configuration.
 */
export interface CaptchaConfig {
  siteKey: string;
  /** Lifetime of the cookie issued after a solved challenge. */
  cookieExpirySeconds: number;
}

/** Per-service configuration. */
export interface ServiceConfig {
  id: string;
  /** Activate working versions once mutated. False keeps them staged. */
  activate: boolean;
  /** Mutate the active version directly instead of cloning it. */
  allowInPlaceEdits: boolean;
  /** Version the first clone starts from, before the engine has activated anything. */
  referenceVersion?: number;
  /** Entries per container. */
  containerCapacity: number;
  /** Upper bound of enforced items per container kind. */
  maxItems: number;
  /** Absent when the service does not challenge traffic. */
  captcha?: CaptchaConfig;
}

/** An account owns services and the credential used to reach them. */
export interface AccountConfig {
  id: string;
  token: string;
  /** Minimum spacing between remote calls made with this credential. */
  minRequestIntervalMs: number;
  services: ServiceConfig[];
}

/** Decision inclusion/exclusion rules. */
export interface DecisionFilters {
  /** Allowed origins; empty allows all. */
  origins: string[];
  /** At least one substring must occur in the scenario when non-empty. */
  scenariosContaining: string[];
  /** No substring may occur in the scenario. */
  scenariosNotContaining: string[];
}

/** Remote-call retry policy. */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Complete engine configuration. */
export interface SyncConfig {
  intervalMs: number;
  fullReconcileIntervalMs: number;
  cachePath: string;
  maxConcurrency: number;
  /** Prefix of every container and snippet the engine owns. */
  namePrefix: string;
  /** Port of the status API. */
  statusPort: number;
  retry: RetryPolicy;
  filters: DecisionFilters;
  accounts: AccountConfig[];
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 30_000,
};

export const DEFAULT_SYNC_SETTINGS = {
  intervalMs: 10_000,
  fullReconcileIntervalMs: 3_600_000,
  cachePath: './edge-sync-cache.json',
  maxConcurrency: 4,
  namePrefix: 'edgesync',
  statusPort: 8080,
  containerCapacity: 1000,
  maxItems: 5000,
  cookieExpirySeconds: 1800,
  minRequestIntervalMs: 0,
} as const;

/** Maximum containers of one kind a service may hold. */
export function maxContainersPerKind(service: Pick<ServiceConfig, 'containerCapacity' | 'maxItems'>): number {
  return Math.max(1, Math.ceil(service.maxItems / service.containerCapacity));
}
