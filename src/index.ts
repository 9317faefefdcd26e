export { Int, Bool, Func, Pi, Linear, Effect, formatType, highlightType, typesEqual, containsDependent, walkType } from './type';
export type { Type, TInt, TBool, TFunc, TPi, TLinear, TEffect, TypeWalker } from './type';
export { Var, Lam, App, Eff, format, highlight, walkExpr } from './expr';
export type { Expr, ExprWalker } from './expr';
export { emptyContext, contextOf, lookup, extend, bindings } from './context';
export type { TypeContext } from './context';
export { infer, inferOrThrow, checkLinear, formatError, InferenceError } from './infer';
export type { TypingError, Inference } from './infer';
export { decodeType, decodeExpr, decodeContext, decodeProgram, encodeType, encodeExpr, encodeProgram, DecodeError } from './json';
export type { Json, Program } from './json';
export { ok, err, isOk } from './utils';
export type { Result } from './utils';
