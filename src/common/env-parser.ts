import { VmError } from './errors';

type ParsedValue = number | boolean;
type ParsingFunction<T extends ParsedValue> = (value: string) => T;

function parseEnv<T extends ParsedValue>(name: string, parser: ParsingFunction<T>, defaultValue?: T): T {
    const value = process.env[name];
    if (value === undefined) {
        if (defaultValue === undefined) {
            throw new VmError('ConfigError', `Missing environment variable: '${name}'`);
        }
        return defaultValue;
    }
    try {
        return parser(value);
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        throw new VmError('ConfigError', `${message} for environment variable: '${name}'`);
    }
}

function makeParsingError(value: string, type: string): Error {
    return new Error(`Invalid ${type} value: '${value}'`);
}

function parseInteger(value: string): number {
    const parsed = value.trim() === '' ? NaN : Number(value);
    if (!Number.isSafeInteger(parsed)) {
        throw makeParsingError(value, 'integer');
    }
    return parsed;
}

function parseNatural(value: string): number {
    const parsed = parseInteger(value);
    if (parsed < 0) {
        throw makeParsingError(value, 'natural');
    }
    return parsed;
}

function parseBoolean(value: string): boolean {
    const TRUE_VALUES = new Set(['true', 't', '1', 'yes', 'y', 'on']);
    const FALSE_VALUES = new Set(['false', 'f', '0', 'no', 'n', 'off']);

    const lowerValue = value.toLowerCase();
    if (TRUE_VALUES.has(lowerValue)) return true;
    if (FALSE_VALUES.has(lowerValue)) return false;
    throw makeParsingError(value, 'boolean');
}

export const parse = {
    integer: (name: string, defaultValue?: number): number => parseEnv(name, parseInteger, defaultValue),
    natural: (name: string, defaultValue?: number): number => parseEnv(name, parseNatural, defaultValue),
    boolean: (name: string, defaultValue?: boolean): boolean => parseEnv(name, parseBoolean, defaultValue),
};
