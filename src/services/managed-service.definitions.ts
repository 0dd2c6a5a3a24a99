import { readFileSync } from 'fs';
import type { ManagedServiceDefinition, RenderEntry } from './interfaces';

/**
 * Reads and validates the managed services definitions file. Any structural
 * problem throws, naming the offending service and field.
 */
export function loadServiceDefinitions(filePath: string): ManagedServiceDefinition[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new Error(`Cannot read managed service definitions from ${filePath}`, { cause: error });
  }
  return parseServiceDefinitions(raw);
}

export function parseServiceDefinitions(raw: unknown): ManagedServiceDefinition[] {
  if (!isRecord(raw) || !Array.isArray(raw.services)) {
    throw new Error('Managed service definitions must be an object with a "services" array');
  }

  const definitions = raw.services.map((entry: unknown, index) => parseDefinition(entry, `services[${index}]`));

  const seen = new Set<string>();
  for (const definition of definitions) {
    if (seen.has(definition.name)) {
      throw new Error(`Managed service "${definition.name}" is defined more than once`);
    }
    seen.add(definition.name);
  }

  return definitions;
}

function parseDefinition(value: unknown, where: string): ManagedServiceDefinition {
  if (!isRecord(value)) {
    throw new Error(`${where} must be an object`);
  }

  const name = requireString(value.name, `${where}.name`);
  const at = `service "${name}"`;

  if (!Array.isArray(value.render)) {
    throw new Error(`${at}: render must be an array`);
  }

  return {
    name,
    render: value.render.map((entry: unknown, index) => parseRenderEntry(entry, `${at}: render[${index}]`)),
    validate: requireCommandList(value.validate, `${at}: validate`),
    reload: requireCommandList(value.reload, `${at}: reload`),
    processes: requireStringList(value.processes ?? [], `${at}: processes`),
    host: value.host === undefined ? undefined : requireString(value.host, `${at}: host`),
    ports: requirePortList(value.ports ?? [], `${at}: ports`),
    optionalPorts: value.optionalPorts === undefined ? undefined : requirePortList(value.optionalPorts, `${at}: optionalPorts`),
  };
}

function parseRenderEntry(value: unknown, where: string): RenderEntry {
  if (!isRecord(value)) {
    throw new Error(`${where} must be an object`);
  }

  const entryPath = requireString(value.path, `${where}.path`);
  if (value.kind === 'file') {
    const mode = value.mode === undefined ? undefined : requireString(value.mode, `${where}.mode`);
    if (mode !== undefined && !/^[0-7]{3}$/.test(mode)) {
      throw new Error(`${where}.mode must be a 3-digit octal string`);
    }
    return { kind: 'file', path: entryPath, template: requireString(value.template, `${where}.template`), mode };
  }
  if (value.kind === 'link') {
    return { kind: 'link', path: entryPath, target: requireString(value.target, `${where}.target`) };
  }
  throw new Error(`${where}.kind must be "file" or "link"`);
}

function requireCommandList(value: unknown, where: string): string[][] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new Error(`${where} must be a non-empty array of commands`);
  }
  return value.map((argv: unknown, index) => {
    const parsed = requireStringList(argv, `${where}[${index}]`);
    if (parsed.length === 0) {
      throw new Error(`${where}[${index}] must not be empty`);
    }
    return parsed;
  });
}

function requireStringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${where} must be an array of strings`);
  }
  return value.map((item: unknown, index) => requireString(item, `${where}[${index}]`));
}

function requirePortList(value: unknown, where: string): number[] {
  if (!Array.isArray(value)) {
    throw new Error(`${where} must be an array of ports`);
  }
  return value.map((item: unknown) => {
    if (typeof item !== 'number' || !Number.isInteger(item) || item < 1 || item > 65535) {
      throw new Error(`${where} contains invalid port ${String(item)}`);
    }
    return item;
  });
}

function requireString(value: unknown, where: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`${where} must be a non-empty string`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
