import { readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import type { SimProps } from '../types/simulation';
import { ConfigError } from '../types/errors';

const INTEGER_PATTERN = /^-?\d+$/;

export function parseSimProps(source: string): SimProps {
  return dotenv.parse(source);
}

export function loadSimProps(path: string): SimProps {
  let source: string;
  try {
    source = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigError('SIM_PROPS', `Unable to read simulation properties from ${path}`, { cause: err });
  }
  return parseSimProps(source);
}

export function readIntProp(props: SimProps, key: string): number {
  const value = readOptionalIntProp(props, key);
  if (value === undefined) throw new ConfigError(key, `Missing required property: ${key}`);
  return value;
}

// Absent keys yield undefined; present but malformed values still fail.
export function readOptionalIntProp(props: SimProps, key: string): number | undefined {
  const raw = props[key]?.trim();
  if (!raw) return undefined;
  if (!INTEGER_PATTERN.test(raw)) {
    throw new ConfigError(key, `Property ${key} must be an integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

export function readStringProp(props: SimProps, key: string): string | undefined {
  const raw = props[key]?.trim();
  return raw ? raw : undefined;
}

export function averageOfRange(props: SimProps, minKey: string, maxKey: string): number {
  return (readIntProp(props, minKey) + readIntProp(props, maxKey)) / 2;
}
