import { describe, it, expect } from 'vitest';
import {
  FatalError,
  NotFoundError,
  PipelineError,
  QueueCapacityError,
  TimeoutError,
  TransientError,
  classifyError,
  errorMessage,
} from '../errors.js';

describe('pipeline errors', () => {
  it('should carry their kind and stay instanceof-checkable', () => {
    const error = new TimeoutError('Download', 500);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toBeInstanceOf(PipelineError);
    expect(error.kind).toBe('Timeout');
    expect(error.message).toBe('Download timed out after 500ms');
    expect(error.name).toBe('TimeoutError');
  });

  it('should keep the cause', () => {
    const cause = new Error('socket hang up');
    const error = new TransientError('Download failed', { cause });

    expect(error.cause).toBe(cause);
  });

  it('should describe a full queue', () => {
    expect(new QueueCapacityError(3).message).toBe(
      'Queue is at capacity (3); remove an entry before pushing'
    );
  });
});

describe('classifyError', () => {
  it('should use the kind of pipeline errors', () => {
    expect(classifyError(new NotFoundError('empty'))).toBe('NotFound');
    expect(classifyError(new PipelineError('Rejected', 'too long'))).toBe('Rejected');
    expect(classifyError(new FatalError('no browser'))).toBe('Fatal');
  });

  it('should treat timeout wording as a timeout', () => {
    expect(classifyError(new Error('connect ETIMEDOUT 10.0.0.1:443'))).toBe('Timeout');
    expect(classifyError(new Error('Navigation timed out'))).toBe('Timeout');
  });

  it('should treat anything else as transient', () => {
    expect(classifyError(new Error('ECONNRESET'))).toBe('Transient');
    expect(classifyError('weird')).toBe('Transient');
  });
});

describe('errorMessage', () => {
  it('should read messages from errors and stringify anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
