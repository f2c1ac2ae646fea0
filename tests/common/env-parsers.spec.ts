import { describe, expect, it } from '@jest/globals';
import { parse } from '../../src/common/env-parser';
import { isVmError } from '../../src/common/errors';

describe('parseEnv', () => {

    const envVarName = 'TEST';

    it('parse an integer', () => {
        const value = 42;
        process.env[envVarName] = value.toString();
        expect(parse.integer(envVarName)).toEqual(value);
    });

    it('get default when parsing a missing integer', () => {
        delete process.env[envVarName];
        expect(parse.integer(envVarName, 7)).toEqual(7);
    });

    it('throw a config error on parsing a missing integer', () => {
        delete process.env[envVarName];
        expect(() => parse.integer(envVarName)).toThrow(`Missing environment variable: '${envVarName}'`);
        try {
            parse.integer(envVarName);
        } catch (e) {
            expect(isVmError(e, 'ConfigError')).toBe(true);
        }
    });

    it('throw an error on parsing invalid integers', () => {
        for (const value of ['3.14', 'invalid', '', ' ']) {
            process.env[envVarName] = value;
            expect(() => parse.integer(envVarName)).toThrow(
                `Invalid integer value: '${value}' for environment variable: '${envVarName}'`
            );
        }
    });

    it('parse a natural number', () => {
        process.env[envVarName] = '0';
        expect(parse.natural(envVarName)).toEqual(0);
        process.env[envVarName] = '1024';
        expect(parse.natural(envVarName)).toEqual(1024);
    });

    it('throw an error on parsing negative natural numbers', () => {
        process.env[envVarName] = '-1';
        expect(() => parse.natural(envVarName)).toThrow(
            `Invalid natural value: '-1' for environment variable: '${envVarName}'`
        );
    });

    it('parse true booleans', () => {
        for (const value of ['true', 't', '1', 'yes', 'y', 'on', 'TRUE']) {
            process.env[envVarName] = value;
            expect(parse.boolean(envVarName)).toEqual(true);
        }
    });

    it('parse false booleans', () => {
        for (const value of ['false', 'f', '0', 'no', 'n', 'off']) {
            process.env[envVarName] = value;
            expect(parse.boolean(envVarName)).toEqual(false);
        }
    });

    it('throw an error on parsing invalid booleans', () => {
        const value = 'invalid';
        process.env[envVarName] = value;
        expect(() => parse.boolean(envVarName)).toThrow(
            `Invalid boolean value: '${value}' for environment variable: '${envVarName}'`
        );
    });

});
