import {
  Env,
  createEnvSettingsReader,
  defineEnvSettings,
  getEnvVariableBoolean,
  getEnvVariableNumber,
  getEnvVariableOneOf,
  getEnvVariableString,
} from './env-settings';

describe('Env Settings Unit Tests', () => {
  describe('Environment Variable String Utilities', () => {
    const mockEnv: Env = {
      MY_VAR: 'my-value',
      FALLBACK_VAR: 'fallback-value',
      EMPTY_VAR: '',
      UNDEFINED_VAR: undefined,
    };

    it('should retrieve an existing environment variable', () => {
      expect(getEnvVariableString(mockEnv, 'MY_VAR', 'FALLBACK_VAR')).toBe(
        'my-value',
      );
    });

    it('should retrieve an existing fallback environment variable', () => {
      expect(
        getEnvVariableString(mockEnv, 'NON_EXISTING', 'FALLBACK_VAR'),
      ).toBe('fallback-value');
    });

    it('should use a default value if the variable is empty', () => {
      expect(
        getEnvVariableString(mockEnv, 'EMPTY_VAR', 'FALLBACK_VAR', 'default'),
      ).toBe('default');
    });

    it('should throw an error if the variable is empty', () => {
      expect(() =>
        getEnvVariableString(mockEnv, 'EMPTY_VAR', 'FALLBACK_VAR'),
      ).toThrow(
        'The environment variable EMPTY_VAR must be a non-empty string.',
      );
    });

    it('should throw an error if the variable is not found', () => {
      expect(() =>
        getEnvVariableString(
          mockEnv,
          'NON_EXISTENT_VAR',
          'NON_EXISTENT_FALLBACK',
        ),
      ).toThrow(
        'The environment variable NON_EXISTENT_VAR must be a non-empty string.',
      );
    });

    it('should throw an error if the variable is undefined', () => {
      expect(() =>
        getEnvVariableString(mockEnv, 'UNDEFINED_VAR', 'NON_EXISTENT_FALLBACK'),
      ).toThrow(
        'The environment variable UNDEFINED_VAR must be a non-empty string.',
      );
    });
  });

  describe('Environment Variable Number Utilities', () => {
    const mockEnv: Env = {
      MY_NUMBER: '42',
      INVALID_NUMBER: 'not-a-number',
      EMPTY_NUMBER: '',
      UNDEFINED_NUMBER: undefined,
    };

    it('should retrieve a valid number from the environment variable', () => {
      expect(getEnvVariableNumber(mockEnv, 'MY_NUMBER', 'FALLBACK_VAR')).toBe(
        42,
      );
    });

    it('should use a default value if the variable is empty', () => {
      expect(
        getEnvVariableNumber(mockEnv, 'UNDEFINED_NUMBER', 'FALLBACK_VAR', 10),
      ).toBe(10);
    });

    it('should throw an error if the variable is not a valid number', () => {
      expect(() =>
        getEnvVariableNumber(mockEnv, 'INVALID_NUMBER', 'FALLBACK_VAR'),
      ).toThrow('The environment variable INVALID_NUMBER must be a number.');
    });

    it('should throw an error if the variable is empty', () => {
      expect(() =>
        getEnvVariableNumber(mockEnv, 'EMPTY_NUMBER', 'FALLBACK_VAR'),
      ).toThrow('The environment variable EMPTY_NUMBER must be a number.');
    });

    it('should throw an error if the variable is undefined', () => {
      expect(() =>
        getEnvVariableNumber(mockEnv, 'UNDEFINED_NUMBER', 'FALLBACK_VAR'),
      ).toThrow('The environment variable UNDEFINED_NUMBER must be a number.');
    });
  });

  describe('getEnvVariableBoolean', () => {
    const mockEnv = {
      FIELD_TRUE: 'true',
      FIELD_FALSE: 'false',
      FIELD_ONE: '1',
      FIELD_ZERO: '0',
      FIELD_OTHER: 'other_value',
    };

    it('should return true for boolean values "true", "1"', () => {
      expect(getEnvVariableBoolean(mockEnv, 'FIELD_TRUE', 'FALLBACK_VAR')).toBe(
        true,
      );
      expect(getEnvVariableBoolean(mockEnv, 'FIELD_ONE', 'FALLBACK_VAR')).toBe(
        true,
      );
    });

    it('should return false for boolean values "false", "0"', () => {
      expect(
        getEnvVariableBoolean(mockEnv, 'FIELD_FALSE', 'FALLBACK_VAR'),
      ).toBe(false);
      expect(getEnvVariableBoolean(mockEnv, 'FIELD_ZERO', 'FALLBACK_VAR')).toBe(
        false,
      );
    });

    it('should throw an error for non-boolean values', () => {
      expect(() =>
        getEnvVariableBoolean(mockEnv, 'FIELD_OTHER', 'FALLBACK_VAR'),
      ).toThrow('The environment variable FIELD_OTHER must be a boolean.');
    });
  });

  describe('getEnvVariableOneOf', () => {
    it('should return an allowed value', () => {
      expect(
        getEnvVariableOneOf({ MODE: 'b' }, 'MODE', ['a', 'b'] as const),
      ).toBe('b');
    });

    it('should fall back to the default value', () => {
      expect(getEnvVariableOneOf({}, 'MODE', ['a', 'b'], undefined, 'a')).toBe(
        'a',
      );
    });

    it('should throw an error for other values', () => {
      expect(() => getEnvVariableOneOf({ MODE: 'c' }, 'MODE', ['a', 'b'])).toThrow(
        'The environment variable MODE must be one of a, b.',
      );
    });
  });

  describe('createEnvSettingsReader', () => {
    it('should prefer the prefixed variable over the fallback one', () => {
      // Arrange
      const reader = createEnvSettingsReader(
        { APP_OUT_SIZE: '5', APP_SIZE: '7', APP_NAME: 'shared' },
        'APP_OUT_',
        'APP_',
      );

      // Act + Assert
      expect(reader.number('SIZE')).toBe(5);
      expect(reader.string('NAME')).toBe('shared');
    });

    it('should not read the fallback variable when it is skipped', () => {
      // Arrange
      const reader = createEnvSettingsReader(
        { APP_NAME: 'shared' },
        'APP_OUT_',
        'APP_',
      );

      // Act + Assert
      expect(reader.string('NAME', 'own', { skipFallback: true })).toBe('own');
    });
  });

  describe('defineEnvSettings', () => {
    const settings = defineEnvSettings('APP_OUT_', 'APP_', (read) => ({
      name: read.string('NAME', undefined, { skipFallback: true }),
      size: read.number('SIZE', 10),
      enabled: read.boolean('ENABLED', false),
      mode: read.oneOf('MODE', ['fast', 'safe'] as const, 'safe', {
        skipFallback: true,
      }),
    }));

    it('should load the settings with their defaults', () => {
      // Arrange
      const env: Env = { APP_OUT_NAME: 'orders', APP_ENABLED: 'true' };

      // Act
      const result = settings.load(env);

      // Assert
      expect(result).toEqual({
        name: 'orders',
        size: 10,
        enabled: true,
        mode: 'safe',
      });
    });

    it('should print the template with the fallback variables as comments', () => {
      expect(settings.template()).toBe(
        [
          'APP_OUT_NAME=',
          'APP_OUT_SIZE=10',
          '# APP_SIZE=10',
          'APP_OUT_ENABLED=false',
          '# APP_ENABLED=false',
          'APP_OUT_MODE=safe',
          '',
        ].join('\n'),
      );
    });
  });
});
