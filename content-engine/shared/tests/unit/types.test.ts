import { Err, ModuleError, Ok, Result } from '../../types.js';

function parsePositive(value: number): Result<number, ModuleError[]> {
  if (value > 0) {
    return Ok(value);
  }
  return Err([{ code: 'E-TEST-NEGATIVE', module: 'TEST', data: { value }, correlationId: 'test-1' }]);
}

describe('Result', () => {
  test('Ok should report success and carry its value', () => {
    const result = parsePositive(3);

    expect(result.isSuccess()).toBe(true);
    expect(result.isError()).toBe(false);
    if (result.isSuccess()) {
      const doubled: number = result.value * 2;
      expect(doubled).toBe(6);
    }
  });

  test('Err should report failure and carry its errors', () => {
    const result = parsePositive(-1);

    expect(result.isSuccess()).toBe(false);
    expect(result.isError()).toBe(true);
    if (result.isError()) {
      expect(result.errors.map(error => error.code)).toEqual(['E-TEST-NEGATIVE']);
    }
    expect(result.value).toBeUndefined();
  });
});
