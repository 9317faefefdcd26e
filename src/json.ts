import { Bool, Effect, Func, Int, Linear, Pi, type Type, walkType } from './type';
import { App, Eff, type Expr, Lam, Var, walkExpr } from './expr';
import { bindings, contextOf, type TypeContext } from './context';
import { hasKey, mapValues } from './utils';

export type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

export type Program = { context: TypeContext, expr: Expr };

export class DecodeError extends Error {
    constructor(path: string, msg: string) {
        super(`DecodeError: ${path}: ${msg}`);
    }
}

function isObject(value: unknown): value is { [key: string]: unknown } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(obj: { [key: string]: unknown }, key: string, path: string): unknown {
    if (!hasKey(obj, key)) {
        throw new DecodeError(path, `missing field '${key}'`);
    }
    return obj[key];
}

function string(obj: { [key: string]: unknown }, key: string, path: string): string {
    const value = field(obj, key, path);
    if (typeof value !== 'string') {
        throw new DecodeError(`${path}.${key}`, `expected a string`);
    }
    return value;
}

function kindOf(value: unknown, path: string): [string, { [key: string]: unknown }] {
    if (!isObject(value)) {
        throw new DecodeError(path, `expected an object`);
    }
    return [string(value, 'kind', path), value];
}

export function decodeType(value: unknown, path = '$'): Type {
    const [kind, obj] = kindOf(value, path);
    const sub = (key: string) => decodeType(field(obj, key, path), `${path}.${key}`);
    switch (kind) {
        case 'int':
            return Int;
        case 'bool':
            return Bool;
        case 'func':
            return Func(sub('input'), sub('output'));
        case 'pi': {
            const result = sub('returns');
            return Pi(string(obj, 'param', path), sub('paramType'), () => result);
        }
        case 'linear':
            return Linear(sub('base'));
        case 'effect':
            return Effect(string(obj, 'effect', path), sub('base'));
        default:
            throw new DecodeError(`${path}.kind`, `unknown type kind '${kind}'`);
    }
}

export function decodeExpr(value: unknown, path = '$'): Expr {
    const [kind, obj] = kindOf(value, path);
    const sub = (key: string) => decodeExpr(field(obj, key, path), `${path}.${key}`);
    switch (kind) {
        case 'var':
            return Var(string(obj, 'name', path));
        case 'lam':
            return Lam(string(obj, 'param', path), decodeType(field(obj, 'paramType', path), `${path}.paramType`), sub('body'));
        case 'app':
            return App(sub('fn'), sub('arg'));
        case 'eff':
            return Eff(string(obj, 'effect', path), sub('expr'));
        default:
            throw new DecodeError(`${path}.kind`, `unknown expression kind '${kind}'`);
    }
}

export function decodeContext(value: unknown, path = '$'): TypeContext {
    if (!isObject(value)) {
        throw new DecodeError(path, `expected an object`);
    }
    return contextOf(mapValues(value, (t, name) => decodeType(t, `${path}.${name}`)));
}

export function decodeProgram(value: unknown): Program {
    if (!isObject(value)) {
        throw new DecodeError('$', `expected an object`);
    }
    const context = hasKey(value, 'context') ? decodeContext(value.context, '$.context') : contextOf({});
    return { context, expr: decodeExpr(field(value, 'expr', '$'), '$.expr') };
}

export const encodeType = walkType<Json>({
    int: () => ({ kind: 'int' }),
    bool: () => ({ kind: 'bool' }),
    func: (_, input, output) => ({ kind: 'func', input, output }),
    pi: ({ param }, paramType, returns) => ({ kind: 'pi', param, paramType, returns }),
    linear: (_, base) => ({ kind: 'linear', base }),
    effect: ({ effect }, base) => ({ kind: 'effect', effect, base }),
});

export const encodeExpr = walkExpr<Json>({
    var: ({ name }) => ({ kind: 'var', name }),
    lam: ({ param, paramType }, body) => ({ kind: 'lam', param, paramType: encodeType(paramType), body }),
    app: (_, fn, arg) => ({ kind: 'app', fn, arg }),
    eff: ({ effect }, expr) => ({ kind: 'eff', effect, expr }),
    unknown: e => { throw new Error(`Cannot encode expression ${JSON.stringify(e)}`) },
});

export function encodeProgram({ context, expr }: Program): { [key: string]: Json } {
    return {
        context: Object.fromEntries(bindings(context).map(([name, t]) => [name, encodeType(t)])),
        expr: encodeExpr(expr),
    };
}
