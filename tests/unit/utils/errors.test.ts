import { describe, it, expect } from 'vitest';
import { EnvKeepError, ErrorCodes, corrupt, fail, ioError, notFound, ok } from '../../../src/utils/errors';

describe('EnvKeepError', () => {
  it('serializes code, message and details', () => {
    const error = corrupt('/envs/api/envkeep.meta.json', 'Unexpected end of JSON input');

    expect(error).toBeInstanceOf(EnvKeepError);
    expect(error.toJSON()).toEqual({
      name: 'EnvKeepError',
      code: ErrorCodes.CORRUPT,
      message: 'Unreadable data at /envs/api/envkeep.meta.json: Unexpected end of JSON input',
      details: { path: '/envs/api/envkeep.meta.json', reason: 'Unexpected end of JSON input' },
    });
  });

  it('keeps the cause message when wrapping IO failures', () => {
    const error = ioError('Cannot read /envs', new Error('EACCES: permission denied'));

    expect(error.code).toBe(ErrorCodes.IO_ERROR);
    expect(error.message).toBe('Cannot read /envs: EACCES: permission denied');
  });
});

describe('ok / fail', () => {
  it('builds both result shapes', () => {
    const error = notFound('api');

    expect(ok(3)).toEqual({ ok: true, value: 3 });
    expect(fail(error)).toEqual({ ok: false, error });
    expect(error.message).toBe("Environment 'api' not found");
  });
});
