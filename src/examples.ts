import { App, Eff, type Expr, Lam, Var } from './expr';
import { Bool, Int, Linear, Pi, type TPi } from './type';
import { contextOf, emptyContext, type TypeContext } from './context';

export type Example = { name: string, context: TypeContext, expr: Expr };

const id = Lam('x', Int, Var('x'));
const withX = contextOf({ x: Int });

export const examples: Example[] = [
    { name: 'identity', context: emptyContext, expr: id },
    { name: 'linear', context: emptyContext, expr: Lam('x', Linear(Int), Var('x')) },
    { name: 'effect', context: withX, expr: Eff('IO', Var('x')) },
    { name: 'application', context: withX, expr: App(id, Var('x')) },
    { name: 'mismatch', context: withX, expr: App(Lam('x', Bool, Var('x')), Var('x')) },
    { name: 'unused linear', context: withX, expr: Lam('x', Linear(Int), Var('y')) },
];

// Π n: Int. Linear[Int]; printable only, nothing infers to it.
export const dependent: TPi = Pi('n', Int, () => Linear(Int));
