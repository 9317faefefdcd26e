#!/usr/bin/env node
import chalk from 'chalk';
import dedent from 'dedent';
import fs from 'fs-extra';
import path from 'path';
import { table } from 'table';
import { parseArgs } from 'util';
import { bindings, type TypeContext } from './context';
import { highlight } from './expr';
import { examples, dependent } from './examples';
import { formatError, infer } from './infer';
import { DecodeError, decodeProgram, encodeProgram, type Program } from './json';
import { highlightType } from './type';
import { isOk } from './utils';

const usage = dedent`
    Usage: typed-lambda [command] [options]

    Commands:
      examples             infer every built-in example (default)
      check <file.json>    infer the type of the program in a JSON file
      context <file.json>  list the context of the program in a JSON file

    Options:
      --json       with examples, print the programs as JSON instead
      --no-color   disable colored output
      -h, --help   show this message
      -v, --version
`;

export function version(): string {
    const pkg: unknown = fs.readJsonSync(path.join(__dirname, '..', 'package.json'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
    }
    return 'unknown';
}

function showContext(ctx: TypeContext): string {
    const entries = bindings(ctx);
    return entries.length ? entries.map(([name, t]) => `${chalk.green(name)}: ${highlightType(t)}`).join(', ') : chalk.gray('∅');
}

function showResult({ context, expr }: Program): string {
    const result = infer(expr, context);
    return isOk(result) ? highlightType(result.ok) : chalk.red(formatError(result.err));
}

function runExamples(json: boolean) {
    if (json) {
        console.log(JSON.stringify(examples.map(({ name, ...program }) => ({ name, ...encodeProgram(program) })), undefined, 2));
        return;
    }
    const rows = examples.map(example => [example.name, highlight(example.expr), showContext(example.context), showResult(example)]);
    console.log(table([[chalk.bold('name'), chalk.bold('expression'), chalk.bold('context'), chalk.bold('type')], ...rows]));
    console.log(chalk`{bold dependent}: ${highlightType(dependent)}`);
}

async function readProgram(file: string): Promise<Program> {
    return decodeProgram(await fs.readJson(file));
}

export async function main(argv: string[]): Promise<number> {
    const { values, positionals } = parseArgs({
        args: argv,
        options: {
            json: { type: 'boolean', default: false },
            'no-color': { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
            version: { type: 'boolean', short: 'v', default: false },
        },
        allowPositionals: true,
    });

    if (values['no-color']) {
        chalk.level = 0;
    }
    if (values.help) {
        console.log(usage);
        return 0;
    }
    if (values.version) {
        console.log(version());
        return 0;
    }

    const [command = 'examples', file] = positionals;
    if (command === 'examples') {
        runExamples(values.json === true);
        return 0;
    }
    if (command !== 'check' && command !== 'context') {
        console.error(chalk.red(`Unknown command ${command}`));
        console.error(usage);
        return 2;
    }
    if (!file) {
        console.error(chalk.red(`Missing file for ${command}`));
        return 2;
    }

    let program: Program;
    try {
        program = await readProgram(file);
    } catch (e) {
        if (e instanceof DecodeError) {
            console.error(chalk.red('ERROR: '), e.message);
            return 1;
        }
        throw e;
    }
    if (command === 'context') {
        const entries = bindings(program.context).map(([name, t]) => [chalk.green(name), highlightType(t)]);
        console.log(table([[chalk.bold('name'), chalk.bold('type')], ...entries]));
        return 0;
    }
    const result = infer(program.expr, program.context);
    if ('err' in result) {
        console.error(chalk.red('ERROR: '), formatError(result.err));
        return 1;
    }
    console.log(chalk`${highlight(program.expr)} {gray :} ${highlightType(result.ok)}`);
    return 0;
}

if (require.main === module) {
    main(process.argv.slice(2)).then(code => {
        process.exitCode = code;
    }, (e: unknown) => {
        console.error(chalk.red('ERROR: '), e instanceof Error ? e.message : e);
        process.exitCode = 1;
    });
}
