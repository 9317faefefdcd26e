import { type Expr, format, walkExpr } from './expr';
import { containsDependent, Effect, formatType, Func, type Type, typesEqual } from './type';
import { emptyContext, extend, lookup, type TypeContext } from './context';
import { err, ok, type Result } from './utils';

export type UnboundVariable = { kind: 'unbound-variable', name: string };
export type LinearityViolation = { kind: 'linearity-violation', name: string };
export type TypeMismatch = { kind: 'type-mismatch', expected: Type, actual: Type };
export type UnknownExpressionShape = { kind: 'unknown-expression-shape', expr: unknown };

export type TypingError = UnboundVariable | LinearityViolation | TypeMismatch | UnknownExpressionShape;

export type Inference = Result<TypingError, Type>;

export function formatError(error: TypingError): string {
    switch (error.kind) {
        case 'unbound-variable':
            return `Unbound variable: ${error.name}`;
        case 'linearity-violation':
            return `Linear variable ${error.name} must be used exactly once.`;
        case 'type-mismatch':
            return `Type mismatch: ${formatType(error.expected)} cannot be applied to ${formatType(error.actual)}`;
        case 'unknown-expression-shape':
            return `Unknown expression type`;
    }
}

export class InferenceError extends Error {
    constructor(public readonly error: TypingError) {
        super(`TypeError: ` + formatError(error));
    }
}

/**
 * Syntactic linearity test: the parameter name must appear somewhere in the
 * rendered body. This accepts `x` inside `max` and never counts uses, so it
 * checks "mentioned at least once" rather than "used exactly once".
 */
export function checkLinear(param: string, body: Expr): boolean {
    return format(body).includes(param);
}

// Dependent function types never take part in the match, even against themselves.
function apply(fnType: Type, argType: Type): Inference {
    if (fnType.kind === 'func' && !containsDependent(fnType.input) && !containsDependent(argType) && typesEqual(fnType.input, argType)) {
        return ok(fnType.output);
    }
    return err<TypingError>({ kind: 'type-mismatch', expected: fnType, actual: argType });
}

const inferIn = walkExpr<(c: TypeContext) => Inference>({
    var: ({ name }) => c => {
        const t = lookup(c, name);
        return t ? ok(t) : err<TypingError>({ kind: 'unbound-variable', name });
    },
    lam: ({ param, paramType, body }, inferBody) => c => {
        // An unmentioned linear parameter wins over any failure inside the body.
        if (paramType.kind === 'linear' && !checkLinear(param, body)) {
            return err<TypingError>({ kind: 'linearity-violation', name: param });
        }
        // The body sees the value itself; the obligation stays on the function's input.
        const bound = paramType.kind === 'linear' ? paramType.base : paramType;
        const result = inferBody(extend(c, param, bound));
        return 'err' in result ? result : ok(Func(paramType, result.ok));
    },
    app: (_, inferFn, inferArg) => c => {
        const fn = inferFn(c);
        if ('err' in fn) {
            return fn;
        }
        const arg = inferArg(c);
        if ('err' in arg) {
            return arg;
        }
        return apply(fn.ok, arg.ok);
    },
    eff: ({ effect }, inferInner) => c => {
        const inner = inferInner(c);
        return 'err' in inner ? inner : ok(Effect(effect, inner.ok));
    },
    unknown: expr => _ => err<TypingError>({ kind: 'unknown-expression-shape', expr }),
});

export function infer(expr: Expr, ctx: TypeContext = emptyContext): Inference {
    return inferIn(expr)(ctx);
}

export function inferOrThrow(expr: Expr, ctx: TypeContext = emptyContext): Type {
    const result = infer(expr, ctx);
    if ('err' in result) {
        throw new InferenceError(result.err);
    }
    return result.ok;
}
