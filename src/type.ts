import chalk from 'chalk';

export type TInt = { kind: 'int' };
export type TBool = { kind: 'bool' };
export type TFunc = { kind: 'func', input: Type, output: Type };
export type TPi = { kind: 'pi', param: string, paramType: Type, returnTypeOf: (param: string) => Type };
export type TLinear = { kind: 'linear', base: Type };
export type TEffect = { kind: 'effect', effect: string, base: Type };

export type Type = TInt | TBool | TFunc | TPi | TLinear | TEffect;

export const Int: TInt = Object.freeze({ kind: 'int' });
export const Bool: TBool = Object.freeze({ kind: 'bool' });

export function Func(input: Type, output: Type): TFunc {
    return Object.freeze({ kind: 'func', input, output });
}

/**
 * Dependent function type `Π param: paramType. returnTypeOf(param)`.
 *
 * `returnTypeOf` receives the parameter's name, not a value: there is no
 * evaluation, so the name stands in for whatever the argument would be.
 */
export function Pi(param: string, paramType: Type, returnTypeOf: (param: string) => Type): TPi {
    return Object.freeze({ kind: 'pi', param, paramType, returnTypeOf });
}

export function Linear(base: Type): TLinear {
    return Object.freeze({ kind: 'linear', base });
}

export function Effect(effect: string, base: Type): TEffect {
    return Object.freeze({ kind: 'effect', effect, base });
}

export interface TypeWalker<T> {
    int(t: TInt): T,
    bool(t: TBool): T,
    func(t: TFunc, input: T, output: T): T,
    pi(t: TPi, paramType: T, result: T): T,
    linear(t: TLinear, base: T): T,
    effect(t: TEffect, base: T): T,
}

export function walkType<T>(walker: TypeWalker<T>) {
    const f = (type: Type): T => {
        if (type.kind === 'int') {
            return walker.int(type);
        } else if (type.kind === 'bool') {
            return walker.bool(type);
        } else if (type.kind === 'func') {
            return walker.func(type, f(type.input), f(type.output));
        } else if (type.kind === 'pi') {
            return walker.pi(type, f(type.paramType), f(type.returnTypeOf(type.param)));
        } else if (type.kind === 'linear') {
            return walker.linear(type, f(type.base));
        } else if (type.kind === 'effect') {
            return walker.effect(type, f(type.base));
        } else {
            const impossible: never = type;
            throw new Error(`Impossible type ${JSON.stringify(impossible)}`);
        }
    }
    return f;
}

export const formatType = walkType<string>({
    int: () => 'Int',
    bool: () => 'Bool',
    func: (_, input, output) => `(${input} -> ${output})`,
    pi: ({ param }, paramType, result) => `(Π ${param}: ${paramType}. ${result})`,
    linear: (_, base) => `Linear[${base}]`,
    effect: ({ effect }, base) => `Effect[${effect}, ${base}]`,
});

export const highlightType = walkType<string>({
    int: () => chalk.red('Int'),
    bool: () => chalk.red('Bool'),
    func: (_, input, output) => `(${input} ${chalk.gray('->')} ${output})`,
    pi: ({ param }, paramType, result) => chalk`({yellow Π} {green ${param}}: ${paramType}. ${result})`,
    linear: (_, base) => chalk`{yellow Linear}[${base}]`,
    effect: ({ effect }, base) => chalk`{yellow Effect}[{magenta ${effect}}, ${base}]`,
});

export const containsDependent = walkType<boolean>({
    int: () => false,
    bool: () => false,
    func: (_, input, output) => input || output,
    pi: () => true,
    linear: (_, base) => base,
    effect: (_, base) => base,
});

// Dependent function types compare by identity only.
export function typesEqual(t1: Type, t2: Type): boolean {
    if (t1.kind === 'int' || t1.kind === 'bool') {
        return t1.kind === t2.kind;
    } else if (t1.kind === 'func') {
        return t2.kind === 'func' && typesEqual(t1.input, t2.input) && typesEqual(t1.output, t2.output);
    } else if (t1.kind === 'pi') {
        return t1 === t2;
    } else if (t1.kind === 'linear') {
        return t2.kind === 'linear' && typesEqual(t1.base, t2.base);
    } else {
        return t2.kind === 'effect' && t1.effect === t2.effect && typesEqual(t1.base, t2.base);
    }
}
