import { describe, it, expect } from '@jest/globals';
import { HttpError } from '../../src/util/httpError';

describe('HttpError', () => {
  it('renders the failure body', () => {
    const error = new HttpError(404, 'ENTITY_NOT_FOUND', 'No entity exists with id 7.');

    expect(error.status).toBe(404);
    expect(error.toBody()).toEqual({ success: false, cause: 'ENTITY_NOT_FOUND', message: 'No entity exists with id 7.' });
  });

  it('falls back to the cause code as the message', () => {
    const error = new HttpError(503, 'REMOTE_CLIENT_UNAVAILABLE');

    expect(error.message).toBe('REMOTE_CLIENT_UNAVAILABLE');
    expect(Object.keys(error).sort()).toEqual(['causeCode', 'name', 'status']);
  });
});
