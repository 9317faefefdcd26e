export type Context<T> = { readonly [name: string]: T };

export type Result<E, T> = { ok: T } | { err: E };

export function ok<T>(value: T): { ok: T } {
    return { ok: value };
}

export function err<E>(error: E): { err: E } {
    return { err: error };
}

export function isOk<E, T>(result: Result<E, T>): result is { ok: T } {
    return 'ok' in result;
}

export function mapValues<A, B>(obj: { [key: string]: A }, f: (a: A, k: string) => B): { [key: string]: B } {
    return Object.fromEntries(Object.entries(obj).map(([k, v]) => [k, f(v, k)]))
}

export function hasKey<T>(obj: Context<T>, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(obj, key);
}
