// src/hash.ts

import * as crypto from 'crypto';
import { UnhashableValueError } from './errors';

/** Digest over a UTF-8 payload, returned as lowercase hex. */
export type HashFunction = (payload: string) => string;

export const HASH_ALGORITHMS = ['sha3-256', 'sha256'] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export function createHashFunction(algorithm: HashAlgorithm): HashFunction {
    return (payload) => crypto.createHash(algorithm).update(payload).digest('hex');
}

export const sha3_256: HashFunction = createHashFunction('sha3-256');
export const sha256: HashFunction = createHashFunction('sha256');

function compareKeys(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

function isPlainObject(value: object): boolean {
    const prototype = Object.getPrototypeOf(value);
    return prototype === Object.prototype || prototype === null;
}

function encode(value: unknown, path: (string | number)[]): string {
    if (Array.isArray(value)) {
        const items = value.map((item, index) => (item === undefined ? 'null' : encode(item, [...path, index])));
        return `[${items.join(',')}]`;
    }
    if (value !== null && typeof value === 'object') {
        if (!isPlainObject(value)) {
            throw new UnhashableValueError(path, `a ${value.constructor?.name ?? 'non-plain'} object`);
        }
        const members = Object.entries(value)
            .filter(([, member]) => member !== undefined)
            .sort(([a], [b]) => compareKeys(a, b))
            .map(([key, member]) => `${JSON.stringify(key)}:${encode(member, [...path, key])}`);
        return `{${members.join(',')}}`;
    }
    if (typeof value === 'number' && !Number.isFinite(value)) {
        throw new UnhashableValueError(path, `the number ${value}`);
    }
    if (value === null || typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
        return JSON.stringify(value);
    }
    throw new UnhashableValueError(path, `a ${typeof value}`);
}

/**
 * JSON encoding whose output depends only on content: object keys are sorted
 * at every depth and undefined members are dropped, array order is kept.
 * Throws UnhashableValueError for anything JSON would lose or alter: NaN and
 * infinities, bigints, functions, symbols, and objects other than plain
 * objects and arrays (Date, Map, Set, class instances).
 */
export function canonicalize(value: unknown): string {
    return encode(value, []);
}
