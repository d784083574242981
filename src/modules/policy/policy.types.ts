import type { PasswordHandler } from '../handlers/handler.types';

export const POLICY_OPTION_NAMES = [
  'salt_size',
  'rounds',
  'default_rounds',
  'min_rounds',
  'max_rounds',
  'vary_rounds',
] as const;

export type PolicyOptionName = (typeof POLICY_OPTION_NAMES)[number];

/** Scope that applies to every scheme and category. */
export const ALL_SCOPE = 'all';

/** Deprecates every declared scheme except the default. */
export const AUTO_DEPRECATED = 'auto';

export type VaryRounds =
  | { readonly kind: 'absolute'; readonly value: number }
  | { readonly kind: 'percent'; readonly value: number };

export type PolicyOptions = {
  salt_size?: number;
  rounds?: number;
  default_rounds?: number;
  min_rounds?: number;
  max_rounds?: number;
  vary_rounds?: VaryRounds;
};

export type SchemeRef = string | PasswordHandler;

/**
 * Plain-object form of a policy:
 *   { schemes: 'a, b' | [...], default, deprecated, 'scope__option': value, 'scope.option': value }
 */
export type PolicyMapping = Readonly<Record<string, unknown>>;

export type PolicyState = {
  readonly schemes?: readonly string[];
  readonly defaultScheme?: string;
  readonly deprecated?: readonly string[];
  /** scope -> options; scope is "all", a category, or a scheme name. */
  readonly options: ReadonlyMap<string, Readonly<PolicyOptions>>;
  /** Handlers supplied inline instead of by name. */
  readonly handlerRefs: ReadonlyMap<string, PasswordHandler>;
};
