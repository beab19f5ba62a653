import { describe, it, expect } from 'vitest';
import { FetchError, ParseError } from '@aph/tee-core';
import { PipelineError, toErrorSlot } from './pipeline-error.js';

describe('toErrorSlot', () => {
  it('should mark fetch failures as unreachable', () => {
    const err = new PipelineError('secretai', 'fetch', {
      cause: new FetchError('TLSError', 'TLS handshake with https://10.0.0.5:29343/cpu.html failed'),
    });

    expect(toErrorSlot('secretai', err)).toEqual({
      vmIdentity: 'secretai',
      status: 'unreachable',
      error: { stage: 'fetch', kind: 'TLSError', message: 'TLS handshake with https://10.0.0.5:29343/cpu.html failed' },
    });
  });

  it('should keep the stage and kind of parse failures', () => {
    const err = new PipelineError('secretai', 'parse', {
      cause: new ParseError('UnknownFormat', 'Unsupported quote version 3'),
    });

    expect(toErrorSlot('secretai', err)).toEqual({
      vmIdentity: 'secretai',
      status: 'unknown',
      error: { stage: 'parse', kind: 'UnknownFormat', message: 'Unsupported quote version 3' },
    });
  });

  it('should hide messages it did not author', () => {
    const err = new PipelineError('secretgpt', 'validate', { cause: new Error('ENOENT: /etc/secret/path') });

    expect(toErrorSlot('secretgpt', err)).toEqual({
      vmIdentity: 'secretgpt',
      status: 'unknown',
      error: { stage: 'validate', kind: 'Internal', message: 'Attestation failed unexpectedly' },
    });
  });

  it('should treat a bare taxonomy error as a fetch-stage failure', () => {
    const slot = toErrorSlot('secretai', new FetchError('EndpointUnreachable', 'Attestation of secretai timed out after 200ms'));

    expect(slot).toMatchObject({ status: 'unreachable', error: { stage: 'fetch', kind: 'EndpointUnreachable' } });
  });
});
