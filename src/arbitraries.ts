import { constant, constantFrom, letrec, oneof, tuple } from 'fast-check';
import { App, Eff, type Expr, Lam, Var } from './expr';
import { Bool, Effect, Func, Int, Linear, type Type } from './type';

export const arbName = constantFrom('x', 'y', 'f', 'n', 'max');
export const arbEffect = constantFrom('IO', 'State', 'Net');

// Dependent function types are left out: they only compare by identity.
export const { type: arbType } = letrec<{ type: Type }>(tie => ({
    type: oneof(
        { depthSize: 'small', withCrossShrink: true },
        constant(Int),
        constant(Bool),
        tuple(tie('type'), tie('type')).map(([input, output]) => Func(input, output)),
        tie('type').map(base => Linear(base)),
        tuple(arbEffect, tie('type')).map(([effect, base]) => Effect(effect, base)),
    ),
}));

export const { expr: arbExpr } = letrec<{ expr: Expr }>(tie => ({
    expr: oneof(
        { depthSize: 'small', withCrossShrink: true },
        arbName.map(name => Var(name)),
        tuple(arbName, arbType, tie('expr')).map(([param, paramType, body]) => Lam(param, paramType, body)),
        tuple(tie('expr'), tie('expr')).map(([fn, arg]) => App(fn, arg)),
        tuple(arbEffect, tie('expr')).map(([effect, expr]) => Eff(effect, expr)),
    ),
}));
