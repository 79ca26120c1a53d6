/**
 * Session tool tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  sessionAbandonHandler,
  sessionFinishHandler,
  sessionStartHandler,
  sessionStatusHandler,
} from '../../../src/tools/session.js';
import { LocationResolver } from '../../../src/services/location/resolver.js';
import type { TimecardContext } from '../../../src/services/context.js';
import {
  NOW,
  createTestContext,
  localIso,
  successData,
  testConfig,
} from '../../helpers/context.js';

describe('session tools', () => {
  let context: TimecardContext;

  beforeEach(() => {
    context = createTestContext();
  });

  describe('timecard_session_start', () => {
    it('starts a session at the current time by default', async () => {
      const data = successData(await sessionStartHandler({}, context));

      expect(data).toEqual({
        start_time: NOW.toISOString(),
        replaced: false,
        message: 'Work session started',
      });
      expect(context.store.inProgress()?.startTime).toEqual(NOW);
    });

    it('accepts an explicit start time', async () => {
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 8, 45) }, context);
      expect(context.store.inProgress()?.startTime).toEqual(new Date(2026, 5, 17, 8, 45));
    });

    it('refuses a second start without replace', async () => {
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 9) }, context);
      const result = await sessionStartHandler({}, context);

      expect(result).toMatchObject({ success: false, code: 'SESSION_IN_PROGRESS' });
      expect(context.store.inProgress()?.startTime).toEqual(new Date(2026, 5, 17, 9));
    });

    it('replaces an open session when asked', async () => {
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 9) }, context);
      const data = successData(
        await sessionStartHandler({ start_time: localIso(2026, 6, 17, 10), replace: true }, context)
      );

      expect(data.replaced).toBe(true);
      expect(context.store.inProgress()?.startTime).toEqual(new Date(2026, 5, 17, 10));
    });

    it('rejects an unparseable start time', async () => {
      const result = await sessionStartHandler({ start_time: 'yesterday' }, context);
      expect(result).toMatchObject({ success: false, code: 'VALIDATION_ERROR' });
    });

    it.each(['June 17', '2026-06-17', '2026-06-17T09:00:00'])(
      'rejects %s, which has no time or offset',
      async (startTime) => {
        const result = await sessionStartHandler({ start_time: startTime }, context);

        expect(result).toMatchObject({ success: false, code: 'VALIDATION_ERROR' });
        expect(context.store.inProgress()).toBeNull();
      }
    );

    it('accepts a numeric offset', async () => {
      await sessionStartHandler({ start_time: '2026-06-17T09:00:00+02:00' }, context);
      expect(context.store.inProgress()?.startTime.toISOString()).toBe('2026-06-17T07:00:00.000Z');
    });
  });

  describe('timecard_session_status', () => {
    it('reports no session', async () => {
      expect(successData(await sessionStatusHandler({}, context))).toEqual({ in_progress: false });
    });

    it('reports elapsed time of the open session', async () => {
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 12, 30) }, context);

      expect(successData(await sessionStatusHandler({}, context))).toEqual({
        in_progress: true,
        start_time: localIso(2026, 6, 17, 12, 30),
        elapsed_hours: 2.5,
        elapsed_formatted: '2h 30m',
      });
    });
  });

  describe('timecard_session_finish', () => {
    it('turns the session into a record ending now', async () => {
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 9) }, context);

      const data = successData(await sessionFinishHandler({ company: ' Acme ' }, context));

      expect(data.message).toBe('Logged 6h for "Acme"');
      expect(data.record).toMatchObject({
        start_time: localIso(2026, 6, 17, 9),
        end_time: NOW.toISOString(),
        date: '2026-06-17',
        total_hours: 6,
        company: 'Acme',
        location: 'Location not available',
        note: '',
      });
      expect(context.store.inProgress()).toBeNull();
      expect(context.store.size).toBe(1);
      expect(context.companies.list()).toEqual(['Acme']);
    });

    it('omits the company from the message when none is given', async () => {
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 14, 15) }, context);
      const data = successData(await sessionFinishHandler({}, context));

      expect(data.message).toBe('Logged 45m');
      expect(context.companies.list()).toEqual([]);
    });

    it('fails without an open session', async () => {
      const result = await sessionFinishHandler({}, context);
      expect(result).toMatchObject({ success: false, code: 'NO_SESSION' });
    });

    it('rejects an end before the start and keeps the session', async () => {
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 9) }, context);

      const result = await sessionFinishHandler({ end_time: localIso(2026, 6, 17, 8) }, context);

      expect(result).toMatchObject({ success: false, code: 'INVALID_RANGE' });
      expect(context.store.inProgress()).not.toBeNull();
      expect(context.store.size).toBe(0);
    });

    it('trims the note to the configured word limit', async () => {
      context = createTestContext({ config: testConfig({ note_max_words: 3 }) });
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 9) }, context);

      await sessionFinishHandler({ note: '  one two\nthree four five ' }, context);

      expect(context.store.list()[0]?.note).toBe('one two three');
    });

    it('stores coordinates and an explicit location', async () => {
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 9) }, context);

      await sessionFinishHandler(
        { location: 'Home office', latitude: 51.5, longitude: -0.12 },
        context
      );

      expect(context.store.list()[0]).toMatchObject({
        locationLabel: 'Home office',
        latitude: 51.5,
        longitude: -0.12,
      });
    });

    it('looks up the address when geocoding is available', async () => {
      const reverse = vi.fn().mockResolvedValue('Baker St, London');
      context = createTestContext({ locations: new LocationResolver({ reverse }) });
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 9) }, context);

      await sessionFinishHandler({ latitude: 51.5, longitude: -0.12 }, context);

      expect(reverse).toHaveBeenCalledWith({ latitude: 51.5, longitude: -0.12 });
      expect(context.store.list()[0]?.locationLabel).toBe('Baker St, London');
    });

    it('refuses to finish a session replaced during the address lookup', async () => {
      let release: (address: string | null) => void = () => {};
      const reverse = vi.fn(
        () =>
          new Promise<string | null>((resolve) => {
            release = resolve;
          })
      );
      context = createTestContext({ locations: new LocationResolver({ reverse }) });
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 9) }, context);

      const pending = sessionFinishHandler({ latitude: 51.5, longitude: -0.12 }, context);
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 10), replace: true }, context);
      release('Baker St, London');

      expect(await pending).toMatchObject({ success: false, code: 'SESSION_CONFLICT' });
      expect(context.store.size).toBe(0);
      expect(context.store.inProgress()?.startTime).toEqual(new Date(2026, 5, 17, 10));
    });

    it('reports no session when it was abandoned during the address lookup', async () => {
      let release: (address: string | null) => void = () => {};
      const reverse = vi.fn(
        () =>
          new Promise<string | null>((resolve) => {
            release = resolve;
          })
      );
      context = createTestContext({ locations: new LocationResolver({ reverse }) });
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 9) }, context);

      const pending = sessionFinishHandler({ latitude: 51.5, longitude: -0.12 }, context);
      await sessionAbandonHandler({}, context);
      release('Baker St, London');

      expect(await pending).toMatchObject({ success: false, code: 'NO_SESSION' });
      expect(context.store.size).toBe(0);
    });

    it('requires latitude and longitude together', async () => {
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 9) }, context);

      const result = await sessionFinishHandler({ latitude: 51.5 }, context);

      expect(result).toMatchObject({ success: false, code: 'VALIDATION_ERROR' });
      expect(context.store.inProgress()).not.toBeNull();
    });

    it('rejects out-of-range coordinates', async () => {
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 9) }, context);
      const result = await sessionFinishHandler({ latitude: 91, longitude: 0 }, context);
      expect(result).toMatchObject({ success: false, code: 'VALIDATION_ERROR' });
    });
  });

  describe('timecard_session_abandon', () => {
    it('discards the open session without a record', async () => {
      await sessionStartHandler({ start_time: localIso(2026, 6, 17, 9) }, context);

      const data = successData(await sessionAbandonHandler({}, context));

      expect(data).toEqual({ abandoned: true, start_time: localIso(2026, 6, 17, 9) });
      expect(context.store.inProgress()).toBeNull();
      expect(context.store.size).toBe(0);
    });

    it('reports when there was nothing to abandon', async () => {
      expect(successData(await sessionAbandonHandler({}, context))).toEqual({
        abandoned: false,
        start_time: null,
      });
    });
  });
});
