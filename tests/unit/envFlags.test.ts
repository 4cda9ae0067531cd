import { isJestRuntime, isTestEnvironment, readEnv } from '../../src/shared/utils/envFlags';

describe('envFlags', () => {
  const saved = process.env.BLOKUS_TEST_FLAG;

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.BLOKUS_TEST_FLAG;
    } else {
      process.env.BLOKUS_TEST_FLAG = saved;
    }
  });

  it('reads a set variable', () => {
    process.env.BLOKUS_TEST_FLAG = 'on';
    expect(readEnv('BLOKUS_TEST_FLAG')).toBe('on');
  });

  it('returns undefined for an unset variable', () => {
    delete process.env.BLOKUS_TEST_FLAG;
    expect(readEnv('BLOKUS_TEST_FLAG')).toBeUndefined();
  });

  it('detects the test environment and the Jest runtime', () => {
    expect(isTestEnvironment()).toBe(true);
    expect(isJestRuntime()).toBe(true);
  });
});
