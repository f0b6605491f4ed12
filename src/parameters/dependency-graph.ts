import { ConfigurationError } from '../errors/index.js';
import type { JsonValue, ParameterDefinition } from '../types/index.js';

const REFERENCE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Names referenced as `${name}` anywhere inside a parameter's extension metadata,
 * in order of first appearance.
 */
export function findReferences(definition: ParameterDefinition): string[] {
  if (!definition.metadata) {
    return [];
  }
  const text = JSON.stringify(definition.metadata);
  const names = new Set<string>();
  for (const match of text.matchAll(REFERENCE_PATTERN)) {
    names.add(match[1]);
  }
  return [...names];
}

/**
 * Replaces `${name}` references inside a metadata value with the resolved values.
 * Unknown names are left untouched.
 */
export function substituteReferences(value: JsonValue, resolved: ReadonlyMap<string, JsonValue>): JsonValue {
  if (typeof value === 'string') {
    return substituteText(value, resolved);
  }
  if (Array.isArray(value)) {
    return value.map(item => substituteReferences(item, resolved));
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, JsonValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = substituteReferences(entry, resolved);
    }
    return result;
  }
  return value;
}

export function substituteText(text: string, resolved: ReadonlyMap<string, JsonValue>): string {
  return text.replace(REFERENCE_PATTERN, (match, name: string) => {
    const replacement = resolved.get(name);
    if (replacement === undefined) {
      return match;
    }
    return typeof replacement === 'string' ? replacement : JSON.stringify(replacement);
  });
}

/**
 * Orders the parameters waiting for a prompt so every parameter comes after the
 * queued parameters its metadata references. Without references the declaration
 * order is kept.
 *
 * @param queue - names waiting for a prompt, in declaration order
 * @param definitions - every parameter the template declares
 * @throws ConfigurationError on a reference to an undeclared parameter or a cycle
 */
export function orderByDependencies(
  queue: readonly string[],
  definitions: ReadonlyMap<string, ParameterDefinition>
): string[] {
  const queued = new Set(queue);
  const edges = new Map<string, string[]>();

  for (const name of queue) {
    const definition = definitions.get(name);
    if (!definition) {
      throw new ConfigurationError(`Parameter '${name}' is not declared by the template`);
    }

    const dependsOn: string[] = [];
    for (const reference of findReferences(definition)) {
      if (!definitions.has(reference)) {
        throw new ConfigurationError(
          `Parameter '${name}' references unknown parameter '${reference}'`,
          { remediation: `Declare '${reference}' in the template or fix the reference in the metadata of '${name}'` }
        );
      }
      // A reference to an already resolved parameter is satisfied and adds no edge
      if (queued.has(reference)) {
        dependsOn.push(reference);
      }
    }
    edges.set(name, dependsOn);
  }

  const ordered: string[] = [];
  const done = new Set<string>();
  const path: string[] = [];

  const visit = (name: string): void => {
    if (done.has(name)) {
      return;
    }
    const cycleStart = path.indexOf(name);
    if (cycleStart !== -1) {
      const cycle = [...path.slice(cycleStart), name];
      throw new ConfigurationError(`Parameter dependency cycle detected: ${cycle.join(' -> ')}`);
    }

    path.push(name);
    for (const dependency of edges.get(name) ?? []) {
      visit(dependency);
    }
    path.pop();

    done.add(name);
    ordered.push(name);
  };

  for (const name of queue) {
    visit(name);
  }

  return ordered;
}
