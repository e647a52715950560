/**
 * Unit Tests for ProgressionEngine
 *
 * Inbound events, read queries, the daily report, the events text and
 * notification hand-off.
 */

import { describe, it, expect, vi } from 'vitest';
import type { INotificationSink } from '../../src/packages/core/ports/INotificationSink.js';

vi.mock('../../src/utils/logger.js', async () => {
  const { loggerMockFactory } = await import('../helpers/logger-mock.js');
  return loggerMockFactory();
});

const { createTestEngine, day, SHORT_CURVE } = await import('../helpers/engine.js');
const { ForbiddenError, ValidationError } = await import('../../src/utils/errors.js');
const { logger } = await import('../../src/utils/logger.js');

const channel = { guildId: '500', channelId: '600' };

function createSink() {
  return {
    notify: vi.fn(),
    reportDailyStats: vi.fn(),
  } satisfies INotificationSink;
}

/**
 * Let queued notification deliveries run
 */
function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('ProgressionEngine', () => {
  describe('onMessage', () => {
    it('awards XP and grants top_3 to a podium user', () => {
      const { engine, store } = createTestEngine();
      const award = engine.onMessage('1001', channel, day(2024, 3, 15));

      expect(award?.xpGained).toBe(3);
      expect(award?.unlocked).toEqual(['first_message', 'top_3']);
      expect(store.getTotalServerMessages()).toBe(1);
    });

    it('counts server messages even while the user is on cooldown', () => {
      const { engine, store } = createTestEngine();
      engine.onMessage('1001', channel, day(2024, 3, 15, 12, 0, 0));

      expect(engine.onMessage('1001', channel, day(2024, 3, 15, 12, 0, 1))).toBeNull();
      expect(store.getTotalServerMessages()).toBe(2);
      expect(store.getUser('1001')?.messageCount).toBe(1);
    });

    it('does not grant top_3 outside the podium', () => {
      const { engine } = createTestEngine();
      for (const userId of ['1001', '1002', '1003']) {
        engine.onMessage(userId, channel, day(2024, 3, 15));
      }

      expect(engine.onMessage('1004', channel, day(2024, 3, 15))?.unlocked).toEqual(['first_message']);
    });

    it('grants top_3 once a user climbs onto the podium', () => {
      const { engine, store } = createTestEngine();
      for (const userId of ['1001', '1002', '1003', '1004']) {
        engine.onMessage(userId, channel, day(2024, 3, 15, 12, 0, 0));
      }

      const award = engine.onMessage('1004', channel, day(2024, 3, 15, 12, 0, 10));

      expect(award?.xpGained).toBe(2);
      expect(award?.unlocked).toEqual(['top_3']);
      expect(engine.leaderboard.rank('1004')).toBe(1);
      expect([...(store.getUser('1004')?.achievements ?? [])]).toEqual(['first_message', 'top_3']);
    });

    it('announces a level-up in the message channel', async () => {
      const sink = createSink();
      const { engine } = createTestEngine({
        settings: { ...SHORT_CURVE, baseMessageXp: 10 },
        notifier: sink,
      });

      engine.onMessage('1001', channel, day(2024, 3, 15));
      await flush();

      expect(sink.notify).toHaveBeenCalledTimes(1);
      expect(sink.notify).toHaveBeenCalledWith({
        kind: 'levelUp',
        userId: '1001',
        level: 1,
        source: 'message',
        channelId: '600',
      });
    });

    it('announces a prestige instead of a level-up', async () => {
      const sink = createSink();
      const { engine } = createTestEngine({
        settings: { ...SHORT_CURVE, baseMessageXp: 50 },
        notifier: sink,
      });

      const award = engine.onMessage('1001', channel, day(2024, 3, 15));
      await flush();

      expect(award?.prestiged).toBe(true);
      expect(award?.leveledUp).toBe(false);
      expect(sink.notify).toHaveBeenCalledTimes(1);
      expect(sink.notify).toHaveBeenCalledWith({
        kind: 'prestige',
        userId: '1001',
        prestige: 1,
        source: 'message',
        channelId: '600',
      });
    });

    it('sends nothing when no level was gained', async () => {
      const sink = createSink();
      const { engine } = createTestEngine({ notifier: sink });

      engine.onMessage('1001', channel, day(2024, 3, 15));
      await flush();

      expect(sink.notify).not.toHaveBeenCalled();
    });

    it('logs delivery failures without affecting the award', async () => {
      const sink = createSink();
      sink.notify.mockRejectedValue(new Error('Missing Access'));
      const { engine, store } = createTestEngine({
        settings: { ...SHORT_CURVE, baseMessageXp: 10 },
        notifier: sink,
      });

      expect(engine.onMessage('1001', channel, day(2024, 3, 15))?.leveledUp).toBe(true);
      await flush();

      expect(store.getUser('1001')?.level).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(
        { kind: 'levelUp', userId: '1001', error: 'Missing Access' },
        'Failed to deliver notification'
      );
    });
  });

  describe('voice sessions', () => {
    it('awards XP for the session length on leave', () => {
      const { engine, store } = createTestEngine();
      engine.onVoiceJoin('1001', day(2024, 3, 15, 12, 0));

      const award = engine.onVoiceLeave('1001', day(2024, 3, 15, 12, 20));

      expect(award?.minutes).toBe(20);
      expect(award?.xpGained).toBe(6);
      expect(store.getUser('1001')?.voiceMinutes).toBe(20);
      expect(store.hasVoiceSession('1001')).toBe(false);
    });

    it('closes short sessions without an award', () => {
      const { engine, store } = createTestEngine();
      engine.onVoiceJoin('1001', day(2024, 3, 15, 12, 0, 0));

      expect(engine.onVoiceLeave('1001', day(2024, 3, 15, 12, 0, 30))).toBeNull();
      expect(store.hasVoiceSession('1001')).toBe(false);
      expect(store.getUser('1001')).toBeUndefined();
    });

    it('ignores a leave without a join', () => {
      const { engine } = createTestEngine();
      expect(engine.onVoiceLeave('1001', day(2024, 3, 15))).toBeNull();
    });

    it('announces voice prestiges without a channel', async () => {
      const sink = createSink();
      const { engine } = createTestEngine({
        settings: { ...SHORT_CURVE, voiceXpPerMinute: 1 },
        notifier: sink,
      });

      engine.onVoiceJoin('1001', day(2024, 3, 15, 12, 0));
      engine.onVoiceLeave('1001', day(2024, 3, 15, 13, 10));
      await flush();

      expect(sink.notify).toHaveBeenCalledWith({
        kind: 'prestige',
        userId: '1001',
        prestige: 1,
        source: 'voice',
        channelId: null,
      });
    });
  });

  describe('onMemberJoin', () => {
    it('counts new members for the day', () => {
      const { engine, store } = createTestEngine();
      engine.onMemberJoin(day(2024, 3, 15));
      engine.onMemberJoin(day(2024, 3, 15));

      expect(store.getDailyStats().newMembers).toBe(2);
      expect(store.users().size).toBe(0);
    });
  });

  describe('getProfile', () => {
    it('returns zero values for a user that has never been seen', () => {
      const { engine } = createTestEngine();

      expect(engine.getProfile('999')).toEqual({
        userId: '999',
        xp: 0,
        level: 0,
        prestige: 0,
        progress: 0,
        requirementForNext: 15,
        rank: 1,
        score: 0,
        messageCount: 0,
        voiceMinutes: 0,
        dailyStreak: 0,
        achievements: [],
      });
    });

    it('reflects recorded activity', () => {
      const { engine } = createTestEngine();
      engine.onMessage('1001', channel, day(2024, 3, 15));

      const profile = engine.getProfile('1001');
      expect(profile.xp).toBe(3);
      expect(profile.progress).toBe(3);
      expect(profile.rank).toBe(1);
      expect(profile.score).toBe(3);
      expect(profile.dailyStreak).toBe(1);
      expect(profile.achievements.map((a) => a.id)).toEqual(['first_message', 'top_3']);
    });
  });

  describe('ensureCurrentDay', () => {
    it('reports the frozen day', () => {
      const { engine } = createTestEngine();
      engine.onMessage('1001', channel, day(2024, 3, 15));

      expect(engine.ensureCurrentDay(day(2024, 3, 16))).toEqual({ frozenDate: '2024-03-15', reset: true });
      expect(engine.ensureCurrentDay(day(2024, 3, 16))).toEqual({ frozenDate: null, reset: false });
    });
  });

  describe('buildDailyReport', () => {
    function createActiveEngine() {
      const ctx = createTestEngine();
      ctx.engine.onMessage('1001', channel, day(2024, 3, 14));
      ctx.engine.onMessage('1001', channel, day(2024, 3, 15));
      ctx.engine.onMessage('1002', channel, day(2024, 3, 15));
      ctx.engine.onMessage('1003', channel, day(2024, 3, 15));
      ctx.engine.ensureCurrentDay(day(2024, 3, 16));
      return ctx;
    }

    it('returns null for a day without history', () => {
      const { engine } = createTestEngine();
      expect(engine.buildDailyReport('2024-03-15')).toBeNull();
    });

    it('summarizes the day against the previous one', () => {
      const { engine } = createActiveEngine();
      const report = engine.buildDailyReport('2024-03-15');

      expect(report?.summary).toEqual({
        messages: 3,
        xpGained: 9,
        voiceMinutes: 0,
        activeUsers: 3,
        levelUps: 0,
        prestiges: 0,
        newMembers: 0,
      });
      expect(report?.previous?.messages).toBe(1);
      expect(report?.deltas).toEqual({ messages: 2, activeUsers: 2, xpGained: 6 });
      expect(report?.topUsers.map((entry) => entry.userId)).toEqual(['1001', '1002', '1003']);
      expect(report?.totals.totalMessages).toBe(4);
      expect(report?.averageXpPerMessage).toBe(3);
      expect(report?.averageVoiceMinutesPerUser).toBe(0);
    });

    it('lists only the users active that day', () => {
      const { engine } = createActiveEngine();
      const report = engine.buildDailyReport('2024-03-14');

      expect(report?.topUsers.map((entry) => entry.userId)).toEqual(['1001']);
      expect(report?.previous).toBeNull();
      expect(report?.deltas).toBeNull();
    });

    it('falls back to the overall leaderboard after a restart', async () => {
      const first = createActiveEngine();
      await first.store.save();

      const restarted = createTestEngine({ storage: first.storage });
      await restarted.store.load();
      const report = restarted.engine.buildDailyReport('2024-03-14');

      expect(report?.topUsers.map((entry) => entry.userId)).toEqual(['1001', '1002', '1003']);
    });

    it('has no averages for an empty day', () => {
      const { engine } = createTestEngine();
      engine.onMemberJoin(day(2024, 3, 15));
      engine.ensureCurrentDay(day(2024, 3, 16));

      const report = engine.buildDailyReport('2024-03-15');
      expect(report?.summary.newMembers).toBe(1);
      expect(report?.averageXpPerMessage).toBeNull();
      expect(report?.averageVoiceMinutesPerUser).toBeNull();
      expect(report?.topUsers).toEqual([]);
    });
  });

  describe('events message', () => {
    it('starts with the default text', () => {
      const { engine } = createTestEngine();
      expect(engine.getEventsMessage()).toBe('No upcoming events.');
    });

    it('stores trimmed text from the administrator', () => {
      const { engine } = createTestEngine({ adminUserId: '42' });
      engine.setEventsMessage('42', '  Game night on Friday  ');

      expect(engine.getEventsMessage()).toBe('Game night on Friday');
    });

    it('rejects other users', () => {
      const { engine } = createTestEngine({ adminUserId: '42' });

      expect(() => engine.setEventsMessage('43', 'Game night')).toThrow(ForbiddenError);
      expect(engine.getEventsMessage()).toBe('No upcoming events.');
    });

    it('rejects everyone when no administrator is configured', () => {
      const { engine } = createTestEngine();
      expect(() => engine.setEventsMessage('42', 'Game night')).toThrow(ForbiddenError);
    });

    it('rejects empty and oversized text', () => {
      const { engine } = createTestEngine({ adminUserId: '42' });

      expect(() => engine.setEventsMessage('42', '   ')).toThrow(ValidationError);
      expect(() => engine.setEventsMessage('42', 'x'.repeat(2001))).toThrow(ValidationError);

      engine.setEventsMessage('42', 'x'.repeat(2000));
      expect(engine.getEventsMessage()).toHaveLength(2000);
    });
  });
});
