#!/usr/bin/env node
import fs from 'node:fs';
import minimist from 'minimist';

import { ADDRESS_SPACE, WORD_MAX } from './common/constants';
import { isVmError } from './common/errors';
import { consoleLogger, Logger, silentLogger } from './common/logger';
import { executeProgram, RunResult } from './runner';
import { buildSimpleProgram } from './vm/program';
import { traceCapacity, vmConf } from './vm.conf';

export function parseProgram(text: string): number[] {
    return text.split(',').map(s => {
        const word = Number(s.trim());
        if (!Number.isInteger(word) || word < 0 || word > WORD_MAX)
            throw new Error(`Invalid instruction word: '${s}'`);
        return word;
    });
}

function optionalNumber(value: unknown, name: string): number | undefined {
    if (value === undefined) return undefined;
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid --${name}: '${value}'`);
    return n;
}

interface CliOptions {
    program: number[];
    memorySize: number;
    maxTicks?: number;
    capacity?: number;
    trace: boolean;
    verbose: boolean;
    out?: string;
}

function parseArgs(argv: string[]): CliOptions {
    const args = minimist(argv, {
        boolean: ['trace', 'verbose'],
        string: ['program', 'out'],
        default: { trace: vmConf.traceEnabled },
    });

    const memorySize = optionalNumber(args['memory-size'], 'memory-size') ?? vmConf.memorySize;
    if (memorySize > ADDRESS_SPACE) throw new Error(`Invalid --memory-size: '${memorySize}'`);
    const trace = Boolean(args.trace);

    return {
        program: args.program ? parseProgram(String(args.program)) : buildSimpleProgram(),
        memorySize,
        maxTicks: optionalNumber(args['max-ticks'], 'max-ticks'),
        capacity: trace ? optionalNumber(args.capacity, 'capacity') ?? traceCapacity() : undefined,
        trace,
        verbose: Boolean(args.verbose),
        out: args.out ? String(args.out) : undefined,
    };
}

export function main(argv: string[], logger: Logger = consoleLogger): number {
    let options: CliOptions;
    try {
        options = parseArgs(argv);
    } catch (e) {
        logger.error(e instanceof Error ? e.message : e);
        return 1;
    }

    let result: RunResult;
    try {
        result = executeProgram(options.program, {
            memorySize: options.memorySize,
            maxTicks: options.maxTicks,
            capacity: options.capacity,
            trace: options.trace,
            logger: options.verbose ? logger : silentLogger,
        });
    } catch (e) {
        if (!isVmError(e)) throw e;
        logger.error(e.message);
        return 1;
    }
    const output = JSON.stringify({
        ticks: result.ticks,
        halted: result.halted,
        fault: result.fault?.message,
        ...result.commitments.toWitness(),
    }, null, 2);

    if (options.out) {
        fs.writeFileSync(options.out, output);
        logger.log(`Witness written to ${options.out}`);
    } else {
        logger.log(output);
    }
    return result.fault ? 2 : 0;
}

if (require.main === module) {
    process.exit(main(process.argv.slice(2)));
}
