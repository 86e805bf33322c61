/**
 * Cache Key Builder
 * 由擁有者物件、方法名稱與參數產生穩定的快取鍵
 *
 * 鍵格式：`<ownerId>:<method>:<sha256(正規化參數)>`
 * 具名參數（物件屬性）順序不影響結果；值為 undefined 的屬性視同不存在
 */

import { hashContent } from './logger.js';
import type { CacheableArgs } from '../types/cache.js';

export class CacheKeyError extends Error {
  public readonly code = 'CACHE_KEY_INVALID';
  public readonly path: string;

  constructor(message: string, path: string) {
    super(`${message} (at ${path})`);
    this.name = 'CacheKeyError';
    this.path = path;
  }
}

// WeakMap 不保留擁有者的參照
const ownerIds = new WeakMap<object, number>();
let nextOwnerId = 1;

/**
 * 取得物件的穩定識別碼（同一物件永遠相同，不同物件永遠不同）
 */
export function getOwnerId(owner: object): number {
  let id = ownerIds.get(owner);
  if (id === undefined) {
    id = nextOwnerId++;
    ownerIds.set(owner, id);
  }
  return id;
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function canonicalNumber(value: number): string {
  // -0 與 0 視為相同
  return Object.is(value, -0) ? '0' : String(value);
}

function sortedJoin(parts: string[]): string {
  return [...parts].sort().join(',');
}

function encode(value: unknown, path: string, seen: Set<object>): string {
  switch (typeof value) {
    case 'string':
      return `s${JSON.stringify(value)}`;
    case 'number':
      return `d${canonicalNumber(value)}`;
    case 'boolean':
      return value ? 'T' : 'F';
    case 'bigint':
      return `i${value.toString()}`;
    case 'undefined':
      return 'u';
    case 'function':
      throw new CacheKeyError('Functions cannot be part of a cache key', path);
    case 'symbol':
      throw new CacheKeyError('Symbols cannot be part of a cache key', path);
  }

  if (value === null) {
    return 'n';
  }
  if (typeof value !== 'object') {
    throw new CacheKeyError(`Unsupported value of type ${typeof value}`, path);
  }

  if (value instanceof Date) {
    const time = value.getTime();
    if (Number.isNaN(time)) {
      throw new CacheKeyError('Invalid Date cannot be part of a cache key', path);
    }
    return `t${time}`;
  }

  if (seen.has(value)) {
    throw new CacheKeyError('Cyclic structures cannot be part of a cache key', path);
  }
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      return `[${value.map((item, i) => encode(item, `${path}[${i}]`, seen)).join(',')}]`;
    }

    if (value instanceof Set) {
      const items: string[] = [];
      for (const item of value) {
        items.push(encode(item, `${path}{}`, seen));
      }
      return `S[${sortedJoin(items)}]`;
    }

    if (value instanceof Map) {
      const entries: string[] = [];
      for (const [k, v] of value) {
        const keyPart = encode(k, `${path}<key>`, seen);
        entries.push(`${keyPart}=${encode(v, `${path}<value>`, seen)}`);
      }
      return `M{${sortedJoin(entries)}}`;
    }

    if (!isPlainObject(value)) {
      const name = value.constructor?.name ?? 'unknown';
      throw new CacheKeyError(`Instances of ${name} cannot be part of a cache key`, path);
    }

    const fields: string[] = [];
    for (const [k, v] of Object.entries(value)) {
      if (v === undefined) continue;
      fields.push(`${JSON.stringify(k)}:${encode(v, `${path}.${k}`, seen)}`);
    }
    return `{${sortedJoin(fields)}}`;
  } finally {
    seen.delete(value);
  }
}

/**
 * 將值轉為決定性的字串表示
 * @throws CacheKeyError 值無法正規化時
 */
export function canonicalize(value: unknown): string {
  return encode(value, '$', new Set());
}

/**
 * 方法層級的鍵前綴，用於依方法或擁有者清除
 */
export function methodKeyPrefix(owner: object, method: string): string {
  return `${getOwnerId(owner)}:${method}:`;
}

export function ownerKeyPrefix(owner: object): string {
  return `${getOwnerId(owner)}:`;
}

/**
 * 建立快取鍵
 * @throws CacheKeyError 參數無法正規化時
 */
export function buildCacheKey(owner: object, method: string, args: CacheableArgs): string {
  // 省略尾端的 undefined，使 f(1) 與 f(1, undefined) 相同
  let end = args.length;
  while (end > 0 && args[end - 1] === undefined) {
    end--;
  }
  const canonical = canonicalize(args.slice(0, end));
  return `${methodKeyPrefix(owner, method)}${hashContent(canonical)}`;
}
