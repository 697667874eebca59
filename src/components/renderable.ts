// src/components/renderable.ts
import type { HasQualifiedName, MappingEntry, RenderableValue } from '../types/renderable.ts';

/** Capability check: anything exposing a callable `getFullName`. */
export function hasQualifiedName(value: unknown): value is HasQualifiedName {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getFullName' in value &&
    typeof value.getFullName === 'function'
  );
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Generic name for values with no richer rendering. */
export function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  try {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  } catch {
    // revoked proxy
    return 'object';
  }
}

function classifyUnguarded(value: unknown): RenderableValue {
  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'number':
    case 'bigint':
      return { kind: 'number', value };
    case 'boolean':
      return { kind: 'boolean', value };
  }

  if (hasQualifiedName(value)) return { kind: 'qualified', target: value };

  if (Array.isArray(value)) {
    // forEach skips holes, so sparse arrays list only the indices they hold
    const entries: MappingEntry[] = [];
    value.forEach((v: unknown, i) => entries.push([i, v]));
    return { kind: 'mapping', entries, source: value };
  }
  if (value instanceof Map) {
    const entries: MappingEntry[] = [...value.entries()];
    return { kind: 'mapping', entries, source: value };
  }
  if (typeof value === 'object' && value !== null && isPlainObject(value)) {
    return { kind: 'mapping', entries: Object.entries(value), source: value };
  }

  return { kind: 'other', typeName: typeName(value) };
}

/**
 * Tag a runtime value for rendering.
 * Arrays, Maps and plain objects are ordered mappings; qualified-name objects win over mappings.
 * A value whose getters or proxy traps throw while being inspected is tagged `other`.
 */
export function classify(value: unknown): RenderableValue {
  try {
    return classifyUnguarded(value);
  } catch {
    return { kind: 'other', typeName: typeName(value) };
  }
}
