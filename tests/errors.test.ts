import { describe, it, expect } from 'vitest';
import {
  ContextualError,
  ErrorCode,
  Errors,
  TelemetryError,
  isTelemetryError,
  toError,
} from '../src/shared/errors.js';

describe('ErrorCode enum', () => {
  it('should contain all configuration error codes', () => {
    expect(ErrorCode.CONFIG_PARSE_ERROR).toBe('CONFIG_PARSE_ERROR');
    expect(ErrorCode.CONFIG_NOT_ABSOLUTE).toBe('CONFIG_NOT_ABSOLUTE');
    expect(ErrorCode.CONFIG_INVALID).toBe('CONFIG_INVALID');
  });

  it('should contain the runtime error codes', () => {
    expect(ErrorCode.BACKEND_UNREACHABLE).toBe('BACKEND_UNREACHABLE');
    expect(ErrorCode.UNEXPECTED_NOTIFICATION).toBe('UNEXPECTED_NOTIFICATION');
  });
});

describe('ContextualError', () => {
  it('should carry message, details and cause', () => {
    const cause = new Error('root');
    const error = new ContextualError('outer', { key: 'value' }, { cause });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ContextualError');
    expect(error.message).toBe('outer');
    expect(error.details).toEqual({ key: 'value' });
    expect(error.cause).toBe(cause);
    expect(error.contextFields()).toEqual({ key: 'value' });
  });

  it('should not share the details object with the caller', () => {
    const details: Record<string, unknown> = { key: 'value' };
    const error = new ContextualError('outer', details);
    details.key = 'changed';

    expect(error.details).toEqual({ key: 'value' });
  });

  it('should leave cause unset when none is given', () => {
    expect('cause' in new ContextualError('plain')).toBe(false);
  });

  it('should capture a stack trace', () => {
    expect(new ContextualError('traced').stack).toContain('traced');
  });
});

describe('TelemetryError', () => {
  it('should put the code ahead of its details', () => {
    const error = new TelemetryError(ErrorCode.CONFIG_INVALID, 'bad', { field: 'level' });

    expect(error).toBeInstanceOf(ContextualError);
    expect(error.name).toBe('TelemetryError');
    expect(Object.entries(error.contextFields())).toEqual([
      ['code', 'CONFIG_INVALID'],
      ['field', 'level'],
    ]);
  });
});

describe('isTelemetryError', () => {
  it('should match by class and optionally by code', () => {
    const error = Errors.configNotAbsolute('/db');

    expect(isTelemetryError(error)).toBe(true);
    expect(isTelemetryError(error, ErrorCode.CONFIG_NOT_ABSOLUTE)).toBe(true);
    expect(isTelemetryError(error, ErrorCode.CONFIG_PARSE_ERROR)).toBe(false);
    expect(isTelemetryError(new Error('plain'))).toBe(false);
    expect(isTelemetryError('CONFIG_INVALID')).toBe(false);
  });
});

describe('toError', () => {
  it('should return errors unchanged', () => {
    const error = new Error('same');

    expect(toError(error)).toBe(error);
  });

  it('should wrap strings and other thrown values', () => {
    expect(toError('oops').message).toBe('oops');
    expect(toError(42).message).toBe('42');
    expect(toError(undefined).message).toBe('undefined');
  });
});

describe('Errors helper', () => {
  it('should create parse errors with the url and cause', () => {
    const cause = new TypeError('Invalid URL');
    const error = Errors.configParse('not-a-url', cause);

    expect(error.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
    expect(error.message).toBe("couldn't parse influxdb url not-a-url");
    expect(error.details).toEqual({ url: 'not-a-url' });
    expect(error.cause).toBe(cause);
  });

  it('should create not-absolute errors', () => {
    const error = Errors.configNotAbsolute('/relative/path');

    expect(error.code).toBe(ErrorCode.CONFIG_NOT_ABSOLUTE);
    expect(error.message).toBe('influxdb monitoring url /relative/path not absolute url');
  });

  it('should create invalid configuration errors', () => {
    const error = Errors.configInvalid('missing url', { option: 'url' });

    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(error.message).toBe('Invalid configuration: missing url');
    expect(error.details).toEqual({ option: 'url' });
  });

  it('should name the scheme it cannot speak', () => {
    const error = Errors.unsupportedScheme('udp');

    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(error.message).toBe('Invalid configuration: influxdb scheme "udp" is not http or https');
  });

  it('should count the hosts that missed the ping', () => {
    const error = Errors.backendUnreachable(3);

    expect(error.code).toBe(ErrorCode.BACKEND_UNREACHABLE);
    expect(error.details).toEqual({ hosts: 3 });
  });

  it('should keep the unexpected notification as cause', () => {
    const notified = new Error('query failed');
    const error = Errors.unexpectedNotification(notified);

    expect(error.code).toBe(ErrorCode.UNEXPECTED_NOTIFICATION);
    expect(error.message).toBe('unexpected error notification: query failed');
    expect(error.cause).toBe(notified);
  });
});
