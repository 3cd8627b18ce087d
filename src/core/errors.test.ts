import * as vm from 'vm';
import { ConversionError, errorMessage, violationsOf } from './errors';

describe('errorMessage', () => {
  it('should read the message of an error', () => {
    expect(errorMessage(new RangeError('out of range'))).toBe('out of range');
  });

  it('should read the message of an error from another realm', () => {
    const foreign: unknown = vm.runInNewContext('new Error("ENOENT: no such file")');
    expect(foreign instanceof Error).toBe(false);
    expect(errorMessage(foreign)).toBe('ENOENT: no such file');
  });

  it('should stringify anything else', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
    expect(errorMessage(null)).toBe('null');
  });
});

describe('violationsOf', () => {
  it('should return the violations an error carries', () => {
    const violations = [{ location: '/name', message: 'bad name', keyword: 'pattern' }];
    expect(violationsOf(new ConversionError('Cannot upgrade', violations))).toEqual(violations);
  });
});
