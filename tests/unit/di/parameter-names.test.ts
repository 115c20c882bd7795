/**
 * @fileoverview Unit tests for parameter name extraction
 */

import { getParameterNames } from '../../../src/infrastructure/di/parameterNames';

class TwoParameters {
  constructor(
    readonly db: string,
    readonly logger: string,
  ) {}
}

class NoConstructor {
  greet(name: string): string {
    return `hello ${name}`;
  }
}

class Derived extends TwoParameters {}

class WithMethodFirst {
  static create(): WithMethodFirst {
    return new WithMethodFirst('default');
  }

  constructor(readonly label: string) {}
}

describe('getParameterNames', () => {
  it('should read constructor parameters of a class', () => {
    expect(getParameterNames(TwoParameters)).toEqual(['db', 'logger']);
  });

  it('should return nothing for a class without a constructor', () => {
    expect(getParameterNames(NoConstructor)).toEqual([]);
    expect(getParameterNames(Derived)).toEqual([]);
  });

  it('should find the constructor after other members', () => {
    expect(getParameterNames(WithMethodFirst)).toEqual(['label']);
  });

  it('should read function parameters', () => {
    function connect(host: string, port: number): string {
      return `${host}:${port}`;
    }

    expect(getParameterNames(connect)).toEqual(['host', 'port']);
  });

  it('should read arrow function parameters', () => {
    const build = (config: string, retries: number) => `${config}/${retries}`;

    expect(getParameterNames(build)).toEqual(['config', 'retries']);
  });

  it('should drop default values, including nested commas and parentheses', () => {
    function withDefaults(limit = Math.max(1, 2), separator = 'a,b') {
      return `${limit}${separator}`;
    }

    expect(getParameterNames(withDefaults)).toEqual(['limit', 'separator']);
  });

  it('should strip the rest operator', () => {
    function collect(...items: string[]): string[] {
      return items;
    }

    expect(getParameterNames(collect)).toEqual(['items']);
  });

  it('should return an empty name for destructured parameters', () => {
    function handle({ id }: { id: string }, [first]: string[]): string {
      return `${id}${first}`;
    }

    expect(getParameterNames(handle)).toEqual(['', '']);
  });

  it('should return nothing for a function without parameters', () => {
    expect(getParameterNames(() => 42)).toEqual([]);
  });
});
