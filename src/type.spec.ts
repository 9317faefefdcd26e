import { deepStrictEqual, strictEqual } from 'assert';
import chalk from 'chalk';
import { assert, property } from 'fast-check';
import { arbType } from './arbitraries';
import { Bool, containsDependent, Effect, formatType, Func, highlightType, Int, Linear, Pi, typesEqual, walkType } from './type';

describe('formatType', () => {
    it('renders base types', () => {
        strictEqual(formatType(Int), 'Int');
        strictEqual(formatType(Bool), 'Bool');
    });

    it('renders compound types', () => {
        strictEqual(formatType(Func(Int, Bool)), '(Int -> Bool)');
        strictEqual(formatType(Func(Func(Int, Int), Bool)), '((Int -> Int) -> Bool)');
        strictEqual(formatType(Linear(Int)), 'Linear[Int]');
        strictEqual(formatType(Effect('IO', Func(Int, Int))), 'Effect[IO, (Int -> Int)]');
    });

    it('passes the parameter name to a dependent return type', () => {
        const t = Pi('n', Int, n => Effect(n, Int));
        strictEqual(formatType(t), '(Π n: Int. Effect[n, Int])');
    });

    it('is idempotent', () => assert(property(arbType, t => formatType(t) === formatType(t))));
});

describe('highlightType', () => {
    const level = chalk.level;
    before(() => { chalk.level = 0; });
    after(() => { chalk.level = level; });

    it('matches formatType without colors', () => assert(property(arbType, t => highlightType(t) === formatType(t))));

    it('matches formatType for dependent types without colors', () => {
        const t = Pi('n', Int, () => Linear(Bool));
        strictEqual(highlightType(t), '(Π n: Int. Linear[Bool])');
    });
});

describe('typesEqual', () => {
    it('compares function types structurally', () => {
        strictEqual(typesEqual(Func(Int, Bool), Func(Int, Bool)), true);
        strictEqual(typesEqual(Func(Int, Bool), Func(Bool, Int)), false);
    });

    it('distinguishes wrappers from their base', () => {
        strictEqual(typesEqual(Linear(Int), Int), false);
        strictEqual(typesEqual(Int, Linear(Int)), false);
        strictEqual(typesEqual(Effect('IO', Int), Effect('IO', Int)), true);
        strictEqual(typesEqual(Effect('IO', Int), Effect('State', Int)), false);
        strictEqual(typesEqual(Effect('IO', Int), Linear(Int)), false);
    });

    it('compares dependent types by identity', () => {
        const t = Pi('n', Int, () => Int);
        strictEqual(typesEqual(t, t), true);
        strictEqual(typesEqual(t, Pi('n', Int, () => Int)), false);
        strictEqual(typesEqual(Int, t), false);
    });

    it('is reflexive', () => assert(property(arbType, t => typesEqual(t, t))));

    it('is symmetric', () => assert(property(arbType, arbType, (t1, t2) => typesEqual(t1, t2) === typesEqual(t2, t1))));

    it('agrees with rendering', () => assert(property(arbType, arbType, (t1, t2) => typesEqual(t1, t2) === (formatType(t1) === formatType(t2)))));
});

describe('walkType', () => {
    it('folds bottom-up', () => {
        const depth = walkType<number>({
            int: () => 1,
            bool: () => 1,
            func: (_, input, output) => 1 + Math.max(input, output),
            pi: (_, paramType, result) => 1 + Math.max(paramType, result),
            linear: (_, base) => 1 + base,
            effect: (_, base) => 1 + base,
        });
        strictEqual(depth(Int), 1);
        strictEqual(depth(Func(Linear(Int), Bool)), 3);
        strictEqual(depth(Pi('n', Int, () => Effect('IO', Int))), 3);
    });

    it('finds dependent types anywhere', () => {
        const pi = Pi('n', Int, () => Int);
        deepStrictEqual([Int, Linear(Int), Func(Int, pi), Effect('IO', Linear(pi))].map(containsDependent), [false, false, true, true]);
    });
});

it('constructs immutable types', () => {
    strictEqual(Object.isFrozen(Func(Int, Bool)), true);
    strictEqual(Object.isFrozen(Int), true);
});
