import type { Type } from './type';
import { type Context, hasKey } from './utils';

export type TypeContext = Context<Type>;

export const emptyContext: TypeContext = contextOf({});

export function contextOf(entries: { [name: string]: Type }): TypeContext {
    return Object.freeze({ ...entries });
}

export function lookup(ctx: TypeContext, name: string): Type | undefined {
    return hasKey(ctx, name) ? ctx[name] : undefined;
}

// Returns a new context; `ctx` itself is never touched.
export function extend(ctx: TypeContext, name: string, type: Type): TypeContext {
    return Object.freeze({ ...ctx, [name]: type });
}

export function bindings(ctx: TypeContext): [string, Type][] {
    return Object.keys(ctx).sort().map((name): [string, Type] => [name, ctx[name]]);
}
