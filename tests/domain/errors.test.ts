import {
  createTypedError,
  describeCause,
  listenerCallbackError,
  trackingIoError,
  ListenerError,
  registrationClosedError,
} from '../../src/domain/errors';

describe('Typed Error Model', () => {
  test('createTypedError produces complete error object', () => {
    const error = createTypedError({
      code: 'EVENT.TEST',
      message: 'test error',
      retryable: true,
      details: { key: 'value' },
      suggestedFixes: [{ type: 'FIX', params: {} }],
    });

    expect(error.code).toBe('EVENT.TEST');
    expect(error.message).toBe('test error');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ key: 'value' });
    expect(error.suggestedFixes).toHaveLength(1);
  });

  test('defaults retryable to false', () => {
    const error = createTypedError({ code: 'TEST', message: 'test' });
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes).toEqual([]);
  });

  test('describeCause renders errors and plain values', () => {
    expect(describeCause(new TypeError('boom'))).toBe('TypeError: boom');
    expect(describeCause('plain')).toBe('plain');
    expect(describeCause(42)).toBe('42');
  });

  test('listenerCallbackError names listener and callback', () => {
    const error = listenerCallbackError('Reporter', 'onFinished', new Error('disk full'));
    expect(error.code).toBe('LISTENER.CALLBACK');
    expect(error.message).toBe('Listener "Reporter" threw in onFinished: Error: disk full');
    expect(error.details).toEqual({ listener: 'Reporter', callback: 'onFinished' });
  });

  test('trackingIoError is retryable and suggests checking the directory', () => {
    const error = trackingIoError('build/ids.txt', new Error('EACCES'));
    expect(error.code).toBe('TRACKING.IO');
    expect(error.retryable).toBe(true);
    expect(error.suggestedFixes.some((f) => f.type === 'CHECK_OUTPUT_DIR')).toBe(true);
  });

  test('registrationClosedError suggests registering earlier', () => {
    const error = registrationClosedError('session_1');
    expect(error.code).toBe('EVENT.REGISTRATION_CLOSED');
    expect(error.suggestedFixes[0].type).toBe('REGISTER_BEFORE_START');
  });

  test('ListenerError carries the typed error', () => {
    const typed = trackingIoError('out.txt', 'nope');
    const err = new ListenerError(typed);
    expect(err.name).toBe('ListenerError');
    expect(err.message).toBe('Failed to write unique ids to out.txt: nope');
    expect(err.typedError).toBe(typed);
  });
});
