/** A reference that does not necessarily keep its target alive */
export interface Ref<T> {
	deref(): T | undefined;
}

/**
 * Holds `value` without owning it. Falls back to a strong reference on
 * runtimes without WeakRef.
 */
export function createNonOwningRef<T extends object>(value: T): Ref<T> {
	if (typeof WeakRef === "undefined") {
		return { deref: () => value };
	}
	return new WeakRef(value);
}
