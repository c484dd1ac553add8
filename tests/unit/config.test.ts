// ---------------------------------------------------------------------------
// Chapa SDK – Configuration Unit Tests
// ---------------------------------------------------------------------------

import { describe, test, expect } from 'vitest';
import {
    ChapaConfigBuilder,
    DEFAULT_BASE_URL,
    DEFAULT_TIMEOUT_MS,
    DEFAULT_VERSION,
    PLACEHOLDER_API_KEY,
} from '../../src/config';
import { ChapaError, ChapaMissingApiKeyError } from '../../src/errors';

describe('ChapaConfigBuilder', () => {
    // ── Defaults ─────────────────────────────────────────────────────────

    describe('defaults', () => {
        test('should fill every field except the key', () => {
            const config = new ChapaConfigBuilder().apiKey('test-secret').build();

            expect(config).toEqual({
                apiKey: 'test-secret',
                baseUrl: 'https://api.chapa.co',
                version: 'v1',
                defaultHeaders: { 'Content-Type': 'application/json' },
                timeout: 30_000,
                logLevel: 'silent',
            });
        });

        test('should expose the default constants', () => {
            expect(DEFAULT_BASE_URL).toBe('https://api.chapa.co');
            expect(DEFAULT_VERSION).toBe('v1');
            expect(DEFAULT_TIMEOUT_MS).toBe(30_000);
            expect(PLACEHOLDER_API_KEY).toBe('placeholder_api_key');
        });
    });

    // ── Fluent setters ───────────────────────────────────────────────────

    describe('fluent setters', () => {
        test('should apply every override', () => {
            const config = new ChapaConfigBuilder()
                .baseUrl('http://localhost:4010')
                .version('v2')
                .apiKey('test-secret')
                .timeout(5_000)
                .addHeader('X-Client-ID', 'checkout-service')
                .logLevel('debug')
                .build();

            expect(config.baseUrl).toBe('http://localhost:4010');
            expect(config.version).toBe('v2');
            expect(config.timeout).toBe(5_000);
            expect(config.logLevel).toBe('debug');
            expect(config.defaultHeaders).toEqual({
                'Content-Type': 'application/json',
                'X-Client-ID': 'checkout-service',
            });
        });

        test('should let addHeader replace Content-Type', () => {
            const config = new ChapaConfigBuilder()
                .apiKey('test-secret')
                .addHeader('Content-Type', 'application/json; charset=utf-8')
                .build();

            expect(config.defaultHeaders['Content-Type']).toBe('application/json; charset=utf-8');
        });

        test('should reject a timeout that is not a positive finite number', () => {
            const builder = new ChapaConfigBuilder();

            expect(() => builder.timeout(Number.NaN)).toThrow(RangeError);
            expect(() => builder.timeout(-5)).toThrow('timeout must be a positive number of milliseconds, got -5');
            expect(() => builder.timeout(0)).toThrow(RangeError);
            expect(() => builder.timeout(Number.POSITIVE_INFINITY)).toThrow(RangeError);
        });

        test('should keep the previous timeout after a rejected value', () => {
            const builder = new ChapaConfigBuilder().apiKey('test-secret').timeout(2_500);

            expect(() => builder.timeout(-1)).toThrow(RangeError);
            expect(builder.build().timeout).toBe(2_500);
        });

        test('should keep the last value when apiKey is called twice', () => {
            const config = new ChapaConfigBuilder().apiKey('first').apiKey('second').build();
            expect(config.apiKey).toBe('second');
        });

        test('should trim whitespace around the key', () => {
            const config = new ChapaConfigBuilder().apiKey('  test-secret  ').build();
            expect(config.apiKey).toBe('test-secret');
        });
    });

    // ── Validation ───────────────────────────────────────────────────────

    describe('build validation', () => {
        test('should throw when no key was set', () => {
            expect(() => new ChapaConfigBuilder().build()).toThrow(ChapaMissingApiKeyError);
        });

        test('should throw for an empty key', () => {
            expect(() => new ChapaConfigBuilder().apiKey('').build()).toThrow(ChapaMissingApiKeyError);
        });

        test('should throw for a whitespace-only key', () => {
            expect(() => new ChapaConfigBuilder().apiKey('   ').build()).toThrow(ChapaMissingApiKeyError);
        });

        test('should throw for the placeholder key', () => {
            expect(() => new ChapaConfigBuilder().apiKey(PLACEHOLDER_API_KEY).build()).toThrow(
                ChapaMissingApiKeyError,
            );
        });

        test('should report the missing_api_key code', () => {
            let caught: unknown;
            try {
                new ChapaConfigBuilder().build();
            } catch (err) {
                caught = err;
            }

            expect(caught).toBeInstanceOf(ChapaError);
            expect(caught).toMatchObject({ code: 'missing_api_key', statusCode: 0 });
        });
    });

    // ── Immutability ─────────────────────────────────────────────────────

    describe('immutability', () => {
        test('should freeze the built config and its headers', () => {
            const config = new ChapaConfigBuilder().apiKey('test-secret').build();

            expect(Object.isFrozen(config)).toBe(true);
            expect(Object.isFrozen(config.defaultHeaders)).toBe(true);
        });

        test('should not leak later builder changes into an earlier build', () => {
            const builder = new ChapaConfigBuilder().apiKey('test-secret');
            const first = builder.build();
            builder.addHeader('X-Trace', 'abc').timeout(1_000);
            const second = builder.build();

            expect(first.defaultHeaders).toEqual({ 'Content-Type': 'application/json' });
            expect(first.timeout).toBe(30_000);
            expect(second.defaultHeaders).toEqual({
                'Content-Type': 'application/json',
                'X-Trace': 'abc',
            });
            expect(second.timeout).toBe(1_000);
        });
    });

    // ── Environment ──────────────────────────────────────────────────────

    describe('fromEnv', () => {
        test('should read the key and overrides from the given env', () => {
            const config = ChapaConfigBuilder.fromEnv({
                CHAPA_API_PUBLIC_KEY: 'test-secret',
                CHAPA_BASE_URL: 'http://localhost:4010',
                CHAPA_VERSION: 'v2',
                CHAPA_LOG_LEVEL: 'warn',
            }).build();

            expect(config.apiKey).toBe('test-secret');
            expect(config.baseUrl).toBe('http://localhost:4010');
            expect(config.version).toBe('v2');
            expect(config.logLevel).toBe('warn');
        });

        test('should fall back to the placeholder and fail to build without a key', () => {
            expect(() => ChapaConfigBuilder.fromEnv({}).build()).toThrow(ChapaMissingApiKeyError);
        });

        test('should allow apiKey() to supply the missing key', () => {
            const config = ChapaConfigBuilder.fromEnv({}).apiKey('test-secret').build();

            expect(config.apiKey).toBe('test-secret');
            expect(config.baseUrl).toBe('https://api.chapa.co');
        });

        test('should ignore an unknown log level', () => {
            const config = ChapaConfigBuilder.fromEnv({
                CHAPA_API_PUBLIC_KEY: 'test-secret',
                CHAPA_LOG_LEVEL: 'loud',
            }).build();

            expect(config.logLevel).toBe('silent');
        });

        test('should ignore empty overrides', () => {
            const config = ChapaConfigBuilder.fromEnv({
                CHAPA_API_PUBLIC_KEY: 'test-secret',
                CHAPA_BASE_URL: '',
                CHAPA_VERSION: '',
            }).build();

            expect(config.baseUrl).toBe('https://api.chapa.co');
            expect(config.version).toBe('v1');
        });
    });
});
