import chalk from 'chalk';
import { formatType, highlightType, type Type } from './type';

export type Var = { kind: 'var', name: string };
export type Lam = { kind: 'lam', param: string, paramType: Type, body: Expr };
export type App = { kind: 'app', fn: Expr, arg: Expr };
export type Eff = { kind: 'eff', effect: string, expr: Expr };

export type Expr = Var | Lam | App | Eff;

export function Var(name: string): Var {
    return Object.freeze({ kind: 'var', name });
}

export function Lam(param: string, paramType: Type, body: Expr): Lam {
    return Object.freeze({ kind: 'lam', param, paramType, body });
}

export function App(fn: Expr, arg: Expr): App {
    return Object.freeze({ kind: 'app', fn, arg });
}

export function Eff(effect: string, expr: Expr): Eff {
    return Object.freeze({ kind: 'eff', effect, expr });
}

/**
 * Bottom-up fold over an expression. Results are memoized per node, so a
 * subtree shared between several parents is only visited once.
 *
 * `unknown` receives any node whose `kind` is none of the four shapes; it only
 * fires for values built outside the constructors above.
 */
export interface ExprWalker<T> {
    var(e: Var): T,
    lam(e: Lam, body: T): T,
    app(e: App, fn: T, arg: T): T,
    eff(e: Eff, expr: T): T,
    unknown(e: never): T,
}

export function walkExpr<T>(walker: ExprWalker<T>) {
    const map = new WeakMap<Expr, T>();
    const f = (expr: Expr): T => {
        if (typeof expr !== 'object' || expr === null) {
            return walker.unknown(expr);
        }
        const cached = map.get(expr);
        if (cached !== undefined) {
            return cached;
        }
        let t: T;
        if (expr.kind === 'var') {
            t = walker.var(expr);
        } else if (expr.kind === 'lam') {
            t = walker.lam(expr, f(expr.body));
        } else if (expr.kind === 'app') {
            t = walker.app(expr, f(expr.fn), f(expr.arg));
        } else if (expr.kind === 'eff') {
            t = walker.eff(expr, f(expr.expr));
        } else {
            return walker.unknown(expr);
        }
        map.set(expr, t);
        return t;
    }
    return f;
}

export const format: (e: Expr) => string = walkExpr<string>({
    var: ({ name }) => name,
    lam: ({ param, paramType }, body) => `(λ${param}: ${formatType(paramType)}. ${body})`,
    app: (_, fn, arg) => `(${fn} ${arg})`,
    eff: ({ effect }, expr) => `[${effect}] ${expr}`,
    unknown: () => '?',
});

export const highlight: (e: Expr) => string = walkExpr<string>({
    var: ({ name }) => chalk.green(name),
    lam: ({ param, paramType }, body) => `(${chalk.yellow('λ')}${chalk.green(param)}: ${highlightType(paramType)}. ${body})`,
    app: (_, fn, arg) => `(${fn} ${arg})`,
    eff: ({ effect }, expr) => `[${chalk.magenta(effect)}] ${expr}`,
    unknown: () => chalk.red('?'),
});
