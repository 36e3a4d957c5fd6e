import { ConfigService } from '@nestjs/config';
import { applyLogLevels, resolveLogLevels, validateEnv } from './env.schema';

describe('validateEnv', () => {
  it('should apply defaults around a database URL', () => {
    expect(validateEnv({ DATABASE_URL: 'postgres://localhost/playlist' })).toEqual({
      NODE_ENV: 'development',
      PORT: 3001,
      DATABASE_URL: 'postgres://localhost/playlist',
      DB_POOL_MAX: 20,
      CORS_ORIGIN: '*',
      LOG_LEVEL: ['log', 'error', 'warn'],
    });
  });

  it('should coerce numeric settings from strings', () => {
    const config = validateEnv({
      DATABASE_URL: 'postgres://localhost/playlist',
      PORT: '8000',
      DB_POOL_MAX: '4',
    });

    expect(config.PORT).toBe(8000);
    expect(config.DB_POOL_MAX).toBe(4);
  });

  it('should refuse to start without DATABASE_URL', () => {
    expect(() => validateEnv({})).toThrow(
      'Invalid environment configuration: DATABASE_URL: Required',
    );
  });

  it('should reject an unknown log level', () => {
    expect(() =>
      validateEnv({ DATABASE_URL: 'postgres://localhost/playlist', LOG_LEVEL: 'log,chatty' }),
    ).toThrow(/LOG_LEVEL/);
  });
});

describe('resolveLogLevels', () => {
  it('should split a comma separated list', () => {
    expect(resolveLogLevels({ LOG_LEVEL: 'error, warn ,debug' })).toEqual([
      'error',
      'warn',
      'debug',
    ]);
  });

  it('should fall back to the defaults on invalid input', () => {
    expect(resolveLogLevels({ LOG_LEVEL: 'loud' })).toEqual(['log', 'error', 'warn']);
  });

  it('should use the defaults when unset', () => {
    expect(resolveLogLevels({})).toEqual(['log', 'error', 'warn']);
  });
});

describe('applyLogLevels', () => {
  it('should switch the app to the levels loaded by ConfigModule', () => {
    const config = new ConfigService(
      validateEnv({ DATABASE_URL: 'postgres://localhost/playlist', LOG_LEVEL: 'error,debug' }),
    );
    const app = {
      get: jest.fn().mockReturnValue(config),
      useLogger: jest.fn(),
    };

    const levels = applyLogLevels(app);

    expect(levels).toEqual(['error', 'debug']);
    expect(app.get).toHaveBeenCalledWith(ConfigService);
    expect(app.useLogger).toHaveBeenCalledWith(['error', 'debug']);
  });
});
