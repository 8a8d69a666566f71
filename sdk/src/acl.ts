/**
 * ACL bindings and the filters used to select them for deletion.
 *
 * A binding pairs a resource pattern with an access control entry.
 * A filter has the same shape, but `null` names and the `any` enum values
 * act as wildcards, so one filter may match zero, one or many bindings.
 */

export const WILDCARD_RESOURCE = '*';

export type ResourceType =
  | 'any'
  | 'topic'
  | 'group'
  | 'cluster'
  | 'transactional_id'
  | 'delegation_token';

export type PatternType = 'any' | 'match' | 'literal' | 'prefixed';

export type AclOperation =
  | 'any'
  | 'all'
  | 'read'
  | 'write'
  | 'create'
  | 'delete'
  | 'alter'
  | 'describe'
  | 'cluster_action'
  | 'describe_configs'
  | 'alter_configs'
  | 'idempotent_write';

export type AclPermissionType = 'any' | 'deny' | 'allow';

const RESOURCE_TYPES: readonly ResourceType[] = [
  'any',
  'topic',
  'group',
  'cluster',
  'transactional_id',
  'delegation_token',
];
const PATTERN_TYPES: readonly PatternType[] = ['any', 'match', 'literal', 'prefixed'];
const OPERATIONS: readonly AclOperation[] = [
  'any',
  'all',
  'read',
  'write',
  'create',
  'delete',
  'alter',
  'describe',
  'cluster_action',
  'describe_configs',
  'alter_configs',
  'idempotent_write',
];
const PERMISSION_TYPES: readonly AclPermissionType[] = ['any', 'deny', 'allow'];

// ---------------------------------------------------------------------------
// Bindings
// ---------------------------------------------------------------------------

export interface ResourcePattern {
  readonly resourceType: Exclude<ResourceType, 'any'>;
  readonly name: string;
  readonly patternType: Exclude<PatternType, 'any' | 'match'>;
}

export interface AccessControlEntry {
  readonly principal: string;
  readonly host: string;
  readonly operation: Exclude<AclOperation, 'any'>;
  readonly permissionType: Exclude<AclPermissionType, 'any'>;
}

export interface AclBinding {
  readonly pattern: ResourcePattern;
  readonly entry: AccessControlEntry;
}

export function aclBinding(pattern: ResourcePattern, entry: AccessControlEntry): AclBinding {
  return Object.freeze({
    pattern: Object.freeze({ ...pattern }),
    entry: Object.freeze({ ...entry }),
  });
}

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

export interface ResourcePatternFilter {
  readonly resourceType: ResourceType;
  /** null matches any resource name */
  readonly name: string | null;
  readonly patternType: PatternType;
}

export interface AccessControlEntryFilter {
  /** null matches any principal */
  readonly principal: string | null;
  /** null matches any host */
  readonly host: string | null;
  readonly operation: AclOperation;
  readonly permissionType: AclPermissionType;
}

export interface AclBindingFilter {
  readonly patternFilter: ResourcePatternFilter;
  readonly entryFilter: AccessControlEntryFilter;
}

export function aclBindingFilter(
  patternFilter: ResourcePatternFilter,
  entryFilter: AccessControlEntryFilter
): AclBindingFilter {
  return Object.freeze({
    patternFilter: Object.freeze({ ...patternFilter }),
    entryFilter: Object.freeze({ ...entryFilter }),
  });
}

export const ANY_ACL_BINDING_FILTER: AclBindingFilter = aclBindingFilter(
  { resourceType: 'any', name: null, patternType: 'any' },
  { principal: null, host: null, operation: 'any', permissionType: 'any' }
);

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

export function matchesResourcePattern(filter: ResourcePatternFilter, pattern: ResourcePattern): boolean {
  if (filter.resourceType !== 'any' && filter.resourceType !== pattern.resourceType) {
    return false;
  }
  if (
    filter.patternType !== 'any' &&
    filter.patternType !== 'match' &&
    filter.patternType !== pattern.patternType
  ) {
    return false;
  }
  if (filter.name === null) {
    return true;
  }
  if (filter.patternType === 'any' || filter.patternType === pattern.patternType) {
    return filter.name === pattern.name;
  }

  // 'match': resolve the filter's concrete name against the binding's pattern
  switch (pattern.patternType) {
    case 'literal':
      return filter.name === pattern.name || pattern.name === WILDCARD_RESOURCE;
    case 'prefixed':
      return filter.name.startsWith(pattern.name);
  }
}

export function matchesAccessControlEntry(
  filter: AccessControlEntryFilter,
  entry: AccessControlEntry
): boolean {
  if (filter.principal !== null && filter.principal !== entry.principal) return false;
  if (filter.host !== null && filter.host !== entry.host) return false;
  if (filter.operation !== 'any' && filter.operation !== entry.operation) return false;
  return filter.permissionType === 'any' || filter.permissionType === entry.permissionType;
}

export function matchesAclBinding(filter: AclBindingFilter, binding: AclBinding): boolean {
  return (
    matchesResourcePattern(filter.patternFilter, binding.pattern) &&
    matchesAccessControlEntry(filter.entryFilter, binding.entry)
  );
}

/**
 * Returns the name of the first field that makes the filter match more than
 * one binding, or null when the filter is fully specified.
 */
export function findIndefiniteField(filter: AclBindingFilter): string | null {
  const { patternFilter, entryFilter } = filter;
  if (patternFilter.resourceType === 'any') return 'Resource type is ANY.';
  if (patternFilter.name === null) return 'Resource name is NULL.';
  if (patternFilter.patternType === 'any') return 'Resource pattern type is ANY.';
  if (patternFilter.patternType === 'match') return 'Resource pattern type is MATCH.';
  if (entryFilter.principal === null) return 'Principal is NULL.';
  if (entryFilter.host === null) return 'Host is NULL.';
  if (entryFilter.operation === 'any') return 'Operation is ANY.';
  if (entryFilter.permissionType === 'any') return 'Permission type is ANY.';
  return null;
}

export function matchesAtMostOne(filter: AclBindingFilter): boolean {
  return findIndefiniteField(filter) === null;
}

// ---------------------------------------------------------------------------
// Equality
// ---------------------------------------------------------------------------

export function aclFilterKey(filter: AclBindingFilter): string {
  const { p, e } = partsOf(filter);
  // typeof tags keep a missing field apart from an explicit null wildcard
  return JSON.stringify(
    [p.resourceType, p.name, p.patternType, e.principal, e.host, e.operation, e.permissionType].map(
      (value) => [typeof value, value ?? null]
    )
  );
}

export function aclBindingKey(binding: AclBinding): string {
  const { pattern: p, entry: e } = binding;
  return JSON.stringify([
    p.resourceType,
    p.name,
    p.patternType,
    e.principal,
    e.host,
    e.operation,
    e.permissionType,
  ]);
}

export function aclFilterEquals(a: AclBindingFilter, b: AclBindingFilter): boolean {
  return aclFilterKey(a) === aclFilterKey(b);
}

export function describeAclBindingFilter(filter: AclBindingFilter): string {
  const { p, e } = partsOf(filter);
  return (
    `(pattern=(${p.resourceType}, name=${p.name ?? '<any>'}, ${p.patternType}), ` +
    `entry=(principal=${e.principal ?? '<any>'}, host=${e.host ?? '<any>'}, ` +
    `${e.operation}, ${e.permissionType}))`
  );
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ValidationResult {
  isValid: boolean;
  errors: Record<string, string>;
}

/**
 * Filters built from untyped input (JSON, CLI args) may omit either half.
 */
function partsOf(filter: AclBindingFilter): {
  p: Partial<ResourcePatternFilter>;
  e: Partial<AccessControlEntryFilter>;
} {
  const raw: Partial<AclBindingFilter> = filter ?? {};
  return { p: raw.patternFilter ?? {}, e: raw.entryFilter ?? {} };
}

function isOneOf<T>(values: readonly T[], value: unknown): boolean {
  return values.some((candidate) => candidate === value);
}

function checkNullableText(
  errors: Record<string, string>,
  field: string,
  value: unknown,
  label: string,
  trim: boolean
): void {
  if (value === null) {
    return;
  }
  if (typeof value !== 'string') {
    errors[field] = `${label} must be a string or null`;
    return;
  }
  if ((trim ? value.trim() : value).length === 0) {
    errors[field] = `${label} cannot be empty; use null to match any ${field}`;
  }
}

/**
 * Checks a filter that may have come from untyped input (JSON, CLI args).
 */
export function validateAclBindingFilter(filter: AclBindingFilter): ValidationResult {
  const errors: Record<string, string> = {};
  const { p, e } = partsOf(filter);

  if (!isOneOf(RESOURCE_TYPES, p.resourceType)) {
    errors.resourceType = `resourceType must be one of ${RESOURCE_TYPES.join(', ')}`;
  }
  if (!isOneOf(PATTERN_TYPES, p.patternType)) {
    errors.patternType = `patternType must be one of ${PATTERN_TYPES.join(', ')}`;
  }
  checkNullableText(errors, 'name', p.name, 'Resource name', false);
  checkNullableText(errors, 'principal', e.principal, 'Principal', true);
  checkNullableText(errors, 'host', e.host, 'Host', true);
  if (!isOneOf(OPERATIONS, e.operation)) {
    errors.operation = `operation must be one of ${OPERATIONS.join(', ')}`;
  }
  if (!isOneOf(PERMISSION_TYPES, e.permissionType)) {
    errors.permissionType = `permissionType must be one of ${PERMISSION_TYPES.join(', ')}`;
  }

  return {
    isValid: Object.keys(errors).length === 0,
    errors,
  };
}
