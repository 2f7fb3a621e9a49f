import { describe, expect, it } from 'vitest';

import { ConfigError } from '../errors.js';
import { Err, Ok, err, isErr, isOk, ok, type Result } from '../result.js';

describe('Result Pattern', () => {
  describe('Ok class', () => {
    it('carries the value and reports Ok', () => {
      const result = new Ok(42);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
      expect(result.unwrap()).toBe(42);
      expect(result.unwrapOr(0)).toBe(42);
    });

    it('maps and flatMaps the success value', () => {
      expect(ok(10).map((x) => x * 2).unwrap()).toBe(20);
      expect(ok(5).flatMap((x) => ok(x * 3)).unwrap()).toBe(15);
    });
  });

  describe('Err class', () => {
    it('carries the error and reports Err', () => {
      const result = new Err('boom');
      expect(result._tag).toBe('Err');
      expect(result.isOk()).toBe(false);
      expect(result.isErr()).toBe(true);
      expect(result.unwrapOr('default')).toBe('default');
    });

    it('maps the error only', () => {
      const mapped = err('boom').mapErr((e) => e.length);
      expect(isErr(mapped)).toBe(true);
      if (isErr(mapped)) expect(mapped.error).toBe(4);
    });

    it('rethrows a carried Error from unwrap', () => {
      const failure = new ConfigError({ message: 'bad seed' });
      expect(() => err(failure).unwrap()).toThrow(failure);
    });

    it('wraps a non-Error value on unwrap', () => {
      expect(() => new Err('test error').unwrap()).toThrow(
        'Called unwrap on an Err value: test error'
      );
    });
  });

  describe('Type guards', () => {
    it('narrow a Result union', () => {
      const divide = (a: number, b: number): Result<number, string> =>
        b === 0 ? err('Division by zero') : ok(a / b);

      const good = divide(20, 4);
      expect(isOk(good)).toBe(true);
      if (isOk(good)) expect(good.value).toBe(5);

      const bad = divide(1, 0);
      expect(isErr(bad)).toBe(true);
      if (isErr(bad)) expect(bad.error).toBe('Division by zero');
    });
  });
});
