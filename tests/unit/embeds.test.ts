/**
 * Unit Tests for embed builders and formatting helpers
 */

import { describe, it, expect } from 'vitest';
import {
  COLORS,
  buildDailyReportEmbed,
  buildDailyStatsEmbed,
  buildLeaderboardEmbed,
  buildLevelUpEmbed,
  buildPrestigeEmbed,
  buildProfileEmbed,
  buildProgressBar,
  formatNumber,
  formatSigned,
  levelMilestone,
  prestigeSuffix,
  rankMarker,
  reportColor,
  trendArrow,
} from '../../src/discord/embeds/index.js';
import { ACHIEVEMENTS } from '../../src/services/achievements.js';
import type { DailyReport, DailySummary, ProfileView } from '../../src/types/index.js';

const emptySummary: DailySummary = {
  messages: 0,
  xpGained: 0,
  voiceMinutes: 0,
  activeUsers: 0,
  levelUps: 0,
  prestiges: 0,
  newMembers: 0,
};

function profileView(overrides: Partial<ProfileView> = {}): ProfileView {
  return {
    userId: '1001',
    xp: 50,
    level: 2,
    prestige: 0,
    progress: 14,
    requirementForNext: 29,
    rank: 3,
    score: 50,
    messageCount: 12,
    voiceMinutes: 0,
    dailyStreak: 2,
    achievements: [],
    ...overrides,
  };
}

describe('format helpers', () => {
  it('formats whole numbers with separators', () => {
    expect(formatNumber(1234.6)).toBe('1,235');
    expect(formatNumber(-0.4)).toBe('0');
  });

  it('formats signed changes', () => {
    expect(formatSigned(-1200)).toBe('-1,200');
    expect(formatSigned(0)).toBe('+0');
    expect(formatSigned(2.5)).toBe('+3');
  });

  it('picks trend arrows and rank markers', () => {
    expect(trendArrow(3)).toBe('📈');
    expect(trendArrow(-1)).toBe('📉');
    expect(trendArrow(0)).toBe('➡️');
    expect(rankMarker(1)).toBe('🥇');
    expect(rankMarker(3)).toBe('🥉');
    expect(rankMarker(4)).toBe('4.');
  });

  it('adds a prestige star only after a prestige', () => {
    expect(prestigeSuffix(0)).toBe('');
    expect(prestigeSuffix(2)).toBe(' ⭐2');
  });
});

describe('progress embeds', () => {
  it('marks milestone levels', () => {
    expect(levelMilestone(10, 50)).toBe('🎯 First milestone reached!');
    expect(levelMilestone(25, 50)).toBe('🚀 Quarter century!');
    expect(levelMilestone(49, 50)).toBe('⚠️ One level away from Prestige!');
    expect(levelMilestone(11, 50)).toBeNull();
  });

  it('builds the level-up announcement', () => {
    const embed = buildLevelUpEmbed(
      { kind: 'levelUp', userId: '1001', level: 10, source: 'voice', channelId: null },
      50
    );

    expect(embed.data.title).toBe('🎉 Level Up!');
    expect(embed.data.description).toBe(
      '<@1001> reached **Level 10** from voice activity! 🎊\n🎯 First milestone reached!'
    );
    expect(embed.data.color).toBe(COLORS.BLURPLE);
  });

  it('builds the prestige announcement', () => {
    const embed = buildPrestigeEmbed({
      kind: 'prestige',
      userId: '1001',
      prestige: 2,
      source: 'message',
      channelId: '600',
    });

    expect(embed.data.title).toBe('🌟 PRESTIGE ACHIEVED! 🌟');
    expect(embed.data.description).toBe(
      '🎊 <@1001> has achieved **Prestige 2**!\n⭐ Your journey begins anew with ultimate bragging rights! ⭐'
    );
    expect(embed.data.color).toBe(COLORS.GOLD);
  });
});

describe('buildProgressBar', () => {
  it('fills the bar in proportion to progress', () => {
    expect(buildProgressBar(14, 29)).toBe(`\`${'█'.repeat(9)}${'░'.repeat(11)}\` 48.3%`);
    expect(buildProgressBar(0, 15)).toBe(`\`${'░'.repeat(20)}\` 0.0%`);
    expect(buildProgressBar(30, 15)).toBe(`\`${'█'.repeat(20)}\` 100.0%`);
  });

  it('returns null when there is no next level', () => {
    expect(buildProgressBar(0, 0)).toBeNull();
  });
});

describe('buildProfileEmbed', () => {
  it('shows the profile with its progress bar', () => {
    const embed = buildProfileEmbed(profileView(), 'Alex');

    expect(embed.data.title).toBe("👤 Alex's Profile");
    expect(embed.data.description).toContain('🥇 **Server Rank:** #3');
    expect(embed.data.description).toContain('📊 **Progress:** 14/29 XP');
    expect(embed.data.fields?.map((field) => field.name)).toEqual(['📈 Level Progress']);
  });

  it('lists five achievements and counts the rest', () => {
    const embed = buildProfileEmbed(profileView({ prestige: 1, achievements: ACHIEVEMENTS.slice(0, 7) }), 'Alex');
    const field = embed.data.fields?.find((entry) => entry.name === '🏅 Achievements');

    expect(embed.data.title).toBe("👤 Alex's Profile ⭐1");
    expect(field?.value.split('\n')).toHaveLength(6);
    expect(field?.value.split('\n')[5]).toBe('+ 2 more...');
  });
});

describe('buildLeaderboardEmbed', () => {
  it('shows a placeholder with no entries', () => {
    const embed = buildLeaderboardEmbed([], new Map(), 10);

    expect(embed.data.title).toBe('🏆 Leaderboards');
    expect(embed.data.description).toBe('No activity data yet. Start chatting to appear on the leaderboard!');
  });

  it('lists ranked users with their XP and voice time', () => {
    const embed = buildLeaderboardEmbed(
      [{ userId: '1001', score: 1230, rank: 1, level: 4, prestige: 1 }],
      new Map([['1001', { xp: 30, voiceMinutes: 50 }]]),
      10
    );

    expect(embed.data.title).toBe('🏆 Activity Leaderboards');
    expect(embed.data.description).toBe('🥇 <@1001> - Lv.4 ⭐1\n    💎 30 XP • 🔊 50m • 📊 1,230 total');
    expect(embed.data.fields).toEqual([
      { name: '📊 Scoring System', value: 'XP + (Voice minutes × 10) + Prestige bonus', inline: false },
    ]);
  });
});

describe('stats embeds', () => {
  it('shows a placeholder before any message today', () => {
    const embed = buildDailyStatsEmbed(
      { date: '2024-03-15', today: emptySummary, previous: null, deltas: null },
      'daily-stats'
    );

    expect(embed.data.title).toBe('📊 Daily Statistics');
    expect(embed.data.description).toBe('No activity recorded today yet. Start chatting!');
  });

  it('compares today with yesterday', () => {
    const today = { ...emptySummary, messages: 4, activeUsers: 2, xpGained: 8 };
    const embed = buildDailyStatsEmbed(
      {
        date: '2024-03-15',
        today,
        previous: { ...emptySummary, messages: 10 },
        deltas: { messages: -6, activeUsers: 2, xpGained: 8 },
      },
      'daily-stats'
    );

    expect(embed.data.title).toBe("📊 Today's Server Statistics - 2024-03-15");
    expect(embed.data.fields?.[1]).toEqual({
      name: '📊 Compared to Yesterday',
      value: '📉 **Messages:** -6\n📈 **Active Users:** +2\n📈 **XP Gained:** +8',
      inline: false,
    });
    expect(embed.data.footer?.text).toBe('Next auto-update in #daily-stats • Use /leaderboard for rankings');
  });

  it('colours the report by activity', () => {
    expect(reportColor(10)).toBe(COLORS.GREEN);
    expect(reportColor(5)).toBe(COLORS.YELLOW);
    expect(reportColor(4)).toBe(COLORS.ORANGE);
  });

  it('builds the end-of-day report', () => {
    const report: DailyReport = {
      date: '2024-03-15',
      summary: { ...emptySummary, messages: 3, xpGained: 9, activeUsers: 3, voiceMinutes: 30 },
      previous: null,
      deltas: null,
      topUsers: [
        { userId: '1001', score: 6, rank: 1, level: 0, prestige: 0 },
        { userId: '1002', score: 3, rank: 2, level: 0, prestige: 2 },
      ],
      totals: { totalMessages: 4, totalXp: 12, totalVoiceMinutes: 30, totalPrestiges: 2, trackedUsers: 3 },
      averageXpPerMessage: 3,
      averageVoiceMinutesPerUser: 10,
    };

    const embed = buildDailyReportEmbed(report);

    expect(embed.data.title).toBe('📊 Daily Server Statistics - 2024-03-15');
    expect(embed.data.color).toBe(COLORS.ORANGE);
    expect(embed.data.fields?.map((field) => field.name)).toEqual([
      '📈 Activity',
      '🏆 Top Active Users',
      '🎯 All-Time Server Stats',
      '🎲 Fun Facts',
    ]);
    expect(embed.data.fields?.[1]?.value).toBe('🥇 <@1001> - Lv.0\n🥈 <@1002> - Lv.0 ⭐2');
    expect(embed.data.fields?.[3]?.value).toBe(
      '💡 Average XP per message: 3.0\n🎤 Average voice time per user: 10m'
    );
  });
});
