import { describe, it, expect, vi } from 'vitest';
import {
  MalformedPayloadError,
  UnknownPmsError,
  VendorApiError,
} from '@/integrations/errors';
import { PmsRegistry } from '@/integrations/registry';
import { PmsApiCaller } from '@/integrations/retry';
import { fakeAdapter } from '../../helpers/fake-adapter';

function setup(maxAttempts = 10) {
  const adapter = fakeAdapter('Mews');
  const registry = new PmsRegistry().register(adapter);
  const caller = new PmsApiCaller(registry, { maxAttempts });
  return { adapter, caller };
}

describe('PmsApiCaller.callWithRetry', () => {
  it('returns the cleaned response on first success', async () => {
    const { adapter, caller } = setup();
    const remoteCall = vi.fn(async (id: string) => JSON.stringify({ ReservationId: id }));

    const result = await caller.callWithRetry('mews', remoteCall, 'res-1');

    expect(result).toEqual({ ReservationId: 'res-1' });
    expect(remoteCall).toHaveBeenCalledTimes(1);
    expect(remoteCall).toHaveBeenCalledWith('res-1');
    expect(adapter.cleanPayload).toHaveBeenCalledWith('{"ReservationId":"res-1"}');
  });

  it('retries through three failures and stops at the fourth attempt', async () => {
    const { adapter, caller } = setup();
    const remoteCall = vi
      .fn<(id: string) => Promise<string>>()
      .mockRejectedValueOnce(new VendorApiError('down'))
      .mockRejectedValueOnce(new VendorApiError('down'))
      .mockRejectedValueOnce(new VendorApiError('down'))
      .mockResolvedValueOnce('{"ok":true}')
      .mockResolvedValue('{"ok":"too many calls"}');

    const result = await caller.callWithRetry('mews', remoteCall, 'res-1');

    expect(result).toEqual({ ok: true });
    expect(remoteCall).toHaveBeenCalledTimes(4);
    expect(adapter.cleanPayload).toHaveBeenCalledTimes(1);
  });

  it('gives up after ten failed attempts with a VendorApiError', async () => {
    const { adapter, caller } = setup();
    const remoteCall = vi
      .fn<(id: string) => Promise<string>>()
      .mockRejectedValue(new VendorApiError('down'));

    const error = await caller.callWithRetry('mews', remoteCall, 'res-1').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(VendorApiError);
    expect(error).toHaveProperty('message', 'Mews API unavailable after 10 attempts');
    expect(remoteCall).toHaveBeenCalledTimes(10);
    expect(adapter.cleanPayload).not.toHaveBeenCalled();
  });

  it('honours a custom attempt budget', async () => {
    const { caller } = setup(3);
    const remoteCall = vi
      .fn<(id: string) => Promise<string>>()
      .mockRejectedValue(new VendorApiError('down'));

    await expect(caller.callWithRetry('mews', remoteCall, 'res-1')).rejects.toBeInstanceOf(
      VendorApiError,
    );
    expect(remoteCall).toHaveBeenCalledTimes(3);
  });

  it('throws UnknownPmsError without calling the vendor when no adapter is registered', async () => {
    const { caller } = setup();
    const remoteCall = vi.fn(async () => '{}');

    await expect(caller.callWithRetry('opera', remoteCall, undefined)).rejects.toBeInstanceOf(
      UnknownPmsError,
    );
    expect(remoteCall).not.toHaveBeenCalled();
  });

  it('does not retry errors other than VendorApiError', async () => {
    const { caller } = setup();
    const remoteCall = vi
      .fn<(id: string) => Promise<string>>()
      .mockRejectedValue(new Error('boom'));

    await expect(caller.callWithRetry('mews', remoteCall, 'res-1')).rejects.toThrow('boom');
    expect(remoteCall).toHaveBeenCalledTimes(1);
  });

  it('does not retry when the response cannot be cleaned', async () => {
    const adapter = fakeAdapter('Mews', {
      cleanPayload: vi.fn(() => {
        throw new MalformedPayloadError('bad json');
      }),
    });
    const caller = new PmsApiCaller(new PmsRegistry().register(adapter), { maxAttempts: 10 });
    const remoteCall = vi.fn(async () => '{bad');

    await expect(caller.callWithRetry('mews', remoteCall, 'res-1')).rejects.toBeInstanceOf(
      MalformedPayloadError,
    );
    expect(remoteCall).toHaveBeenCalledTimes(1);
  });
});
