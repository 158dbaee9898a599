function rejectMutation(): never {
    throw new TypeError('Published artifacts are read-only');
}

function sealCollection(collection: object, mutators: readonly string[]): void {
    if (!Object.isExtensible(collection)) return;
    for (const method of mutators) {
        Object.defineProperty(collection, method, { value: rejectMutation });
    }
    Object.freeze(collection);
}

function isPlainObject(value: object): boolean {
    const prototype = Object.getPrototypeOf(value);
    return prototype === Object.prototype || prototype === null;
}

function freezeInto(value: unknown, seen: WeakSet<object>): void {
    if (typeof value !== 'object' || value === null || seen.has(value)) return;
    seen.add(value);

    if (Array.isArray(value)) {
        for (const item of value) freezeInto(item, seen);
        Object.freeze(value);
    } else if (value instanceof Map) {
        for (const [key, item] of value) {
            freezeInto(key, seen);
            freezeInto(item, seen);
        }
        sealCollection(value, ['set', 'delete', 'clear']);
    } else if (value instanceof Set) {
        for (const item of value) freezeInto(item, seen);
        sealCollection(value, ['add', 'delete', 'clear']);
    } else if (isPlainObject(value)) {
        for (const item of Object.values(value)) freezeInto(item, seen);
        Object.freeze(value);
    }
}

/**
 * Freezes a published value in place so branches sharing it cannot change it.
 * Arrays, plain objects, Maps and Sets are frozen recursively. Class
 * instances (models, transformers, dates, typed arrays) are shared by
 * reference and left as they are.
 */
export function freezeArtifact<T>(value: T): T {
    freezeInto(value, new WeakSet());
    return value;
}
