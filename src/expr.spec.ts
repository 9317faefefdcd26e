import { deepStrictEqual, strictEqual } from 'assert';
import { assert, property } from 'fast-check';
import { arbExpr } from './arbitraries';
import { App, Eff, type Expr, format, Lam, Var, walkExpr } from './expr';
import { Bool, Func, Int, Linear } from './type';

describe('format', () => {
    it('renders each shape', () => {
        strictEqual(format(Var('x')), 'x');
        strictEqual(format(Lam('x', Int, Var('x'))), '(λx: Int. x)');
        strictEqual(format(App(Var('f'), Var('x'))), '(f x)');
        strictEqual(format(Eff('IO', Var('x'))), '[IO] x');
    });

    it('renders parameter types inside lambdas', () => {
        const e = Lam('f', Func(Int, Bool), App(Var('f'), Var('y')));
        strictEqual(format(e), '(λf: (Int -> Bool). (f y))');
        strictEqual(format(Lam('x', Linear(Int), Eff('IO', Var('x')))), '(λx: Linear[Int]. [IO] x)');
    });

    it('renders shared subtrees at every occurrence', () => {
        const x = Var('x');
        strictEqual(format(App(x, App(x, x))), '(x (x x))');
    });

    it('renders unknown nodes as a placeholder', () => {
        const bogus: Expr = JSON.parse('{"kind":"let"}');
        strictEqual(format(App(Var('f'), bogus)), '(f ?)');
        const missing: Expr = JSON.parse('null');
        strictEqual(format(Eff('IO', missing)), '[IO] ?');
    });

    it('is idempotent', () => assert(property(arbExpr, e => format(e) === format(e))));
});

describe('walkExpr', () => {
    const names = walkExpr<string[]>({
        var: ({ name }) => [name],
        lam: ({ param }, body) => [param, ...body],
        app: (_, fn, arg) => [...fn, ...arg],
        eff: (_, expr) => expr,
        unknown: () => [],
    });

    it('folds bottom-up', () => {
        deepStrictEqual(names(App(Lam('x', Int, Var('x')), Eff('IO', Var('y')))), ['x', 'x', 'y']);
    });

    it('visits a shared node once', () => {
        let visits = 0;
        const count = walkExpr<number>({
            var: () => ++visits,
            lam: (_, body) => body,
            app: (_, fn, arg) => fn + arg,
            eff: (_, expr) => expr,
            unknown: () => 0,
        });
        const x = Var('x');
        count(App(x, x));
        strictEqual(visits, 1);
    });
});

it('constructs immutable expressions', () => {
    const e = Lam('x', Int, Var('x'));
    strictEqual(Object.isFrozen(e), true);
    strictEqual(Object.isFrozen(e.body), true);
});
