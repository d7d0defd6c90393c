import { createGenericError } from '../types/errors.js';

/**
 * Growable bitset over non-negative integer ids.
 * One bit per id keeps million-formula runs cheap to track.
 */
export class IdSet {
    private bytes: Uint8Array;
    private count = 0;

    constructor(initialCapacity: number = 1024) {
        this.bytes = new Uint8Array(Math.max(1, Math.ceil(initialCapacity / 8)));
    }

    get size(): number {
        return this.count;
    }

    has(id: number): boolean {
        const byte = id >>> 3;
        if (byte >= this.bytes.length) return false;
        return (this.bytes[byte] & (1 << (id & 7))) !== 0;
    }

    /**
     * Add an id; returns false when it was already present
     */
    add(id: number): boolean {
        if (!Number.isInteger(id) || id < 0) {
            throw createGenericError('INVALID_OPTIONS', `IdSet only holds non-negative integers, got ${id}`, { id });
        }
        const byte = id >>> 3;
        if (byte >= this.bytes.length) this.grow(byte + 1);
        const bit = 1 << (id & 7);
        if ((this.bytes[byte] & bit) !== 0) return false;
        this.bytes[byte] |= bit;
        this.count++;
        return true;
    }

    private grow(minBytes: number): void {
        let length = this.bytes.length;
        while (length < minBytes) length *= 2;
        const next = new Uint8Array(length);
        next.set(this.bytes);
        this.bytes = next;
    }
}
