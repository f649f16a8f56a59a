import { describe, expect, it } from 'vitest';

import { ResultBuilder } from './resultBuilder';

describe('ResultBuilder', () => {
  it('should start out valid with every summary kind at zero', () => {
    const result = new ResultBuilder('data.csv').finalize();

    expect(result).toEqual({
      valid: true,
      filePath: 'data.csv',
      totalRows: 0,
      rowsValidated: 0,
      errorCount: 0,
      summary: { file: 0, structural: 0, type: 0, required: 0, custom: 0 },
      errors: [],
    });
  });

  it('should count errors per kind and keep their order', () => {
    const builder = new ResultBuilder('data.csv');
    builder.addError(2, 'age', 'type', "Invalid type for 'age'. Expected integer, got 'x'", 'x');
    builder.addError(3, 'email', 'required', "Required field 'email' is empty or missing");
    builder.addError(4, 'age', 'type', "Invalid type for 'age'. Expected integer, got 'y'", 'y');

    const result = builder.finalize();

    expect(result.valid).toBe(false);
    expect(result.errorCount).toBe(3);
    expect(result.summary).toEqual({ file: 0, structural: 0, type: 2, required: 1, custom: 0 });
    expect(result.errors.map(e => e.line)).toEqual([2, 3, 4]);
    expect('value' in result.errors[1]).toBe(false);
    expect(result.errors[2].value).toBe('y');
  });

  it('should stop allowing more work once the cap is reached', () => {
    const builder = new ResultBuilder('data.csv', 2);

    expect(builder.shouldContinue()).toBe(true);
    builder.addError(2, 'a', 'type', 'first', '1');
    expect(builder.shouldContinue()).toBe(true);
    builder.addError(2, 'b', 'type', 'second', '2');
    expect(builder.shouldContinue()).toBe(false);
  });

  it('should never stop without a cap', () => {
    const builder = new ResultBuilder('data.csv');
    for (let i = 0; i < 50; i++) {
      builder.addError(i + 2, 'a', 'custom', 'rejected', 'v');
    }

    expect(builder.shouldContinue()).toBe(true);
  });

  it('should not be affected by changes after finalizing', () => {
    const builder = new ResultBuilder('data.csv');
    builder.countRow();
    builder.countValidRow();
    const result = builder.finalize();

    builder.countRow();
    builder.addError(3, 'a', 'required', 'missing');

    expect(result.totalRows).toBe(1);
    expect(result.rowsValidated).toBe(1);
    expect(result.errors).toEqual([]);
    expect(result.valid).toBe(true);
  });
});
