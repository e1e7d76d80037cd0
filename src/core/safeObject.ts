const UNSAFE_OBJECT_KEYS = new Set(["__proto__", "prototype", "constructor"]);

export function isUnsafeObjectKey(key: string): boolean {
    return UNSAFE_OBJECT_KEYS.has(key);
}

export function safeAssign(target: Record<string, unknown>, key: string, value: unknown): void {
    if (isUnsafeObjectKey(key)) {
        Object.defineProperty(target, key, {
            value,
            writable: true,
            enumerable: true,
            configurable: true,
        });
        return;
    }
    target[key] = value;
}

/** Plain object (object literal or null-prototype), not an array, class instance or Date. */
export function isRecord(value: unknown): value is Record<string, unknown> {
    if (typeof value !== "object" || value === null) return false;
    const proto = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/** Fresh copy of the plain objects, arrays and dates inside `value`; other values are returned as they are. */
export function copyPlain(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(copyPlain);
    if (value instanceof Date) return new Date(value.getTime());
    if (!isRecord(value)) return value;
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
        safeAssign(out, key, copyPlain(item));
    }
    return out;
}

/** Own property of `data`, or undefined; inherited keys are never read. */
export function readOwn(data: Record<string, unknown>, key: string): unknown {
    return Object.prototype.hasOwnProperty.call(data, key) ? data[key] : undefined;
}
