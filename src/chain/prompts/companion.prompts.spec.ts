import {
  buildMoodSummaryInput,
  buildSystemPrompt,
  formatMoodLog,
} from './companion.prompts';

describe('companion prompts', () => {
  describe('buildSystemPrompt', () => {
    it('should describe the persona only when nothing is known', () => {
      const prompt = buildSystemPrompt({
        userId: 'user-1',
        profile: null,
        moodSummary: '',
      });

      expect(prompt).toMatch(/^You are a warm, supportive wellbeing companion\./);
      expect(prompt).not.toContain('About the user');
      expect(prompt).not.toContain('Recent mood');
    });

    it('should append the profile and mood summary', () => {
      const prompt = buildSystemPrompt({
        userId: 'user-1',
        profile: {
          displayName: 'Sam',
          age: 29,
          occupation: 'Nurse',
          goals: ['sleep better', 'walk daily'],
        },
        moodSummary: 'Mood has improved this week.',
      });

      const sections = prompt.split('\n\n');
      expect(sections).toHaveLength(3);
      expect(sections[1]).toBe(
        'About the user:\nName: Sam\nAge: 29\nOccupation: Nurse\nGoals: sleep better, walk daily',
      );
      expect(sections[2]).toBe('Recent mood: Mood has improved this week.');
    });

    it('should skip an empty profile section', () => {
      const prompt = buildSystemPrompt({
        userId: 'user-1',
        profile: { goals: [] },
        moodSummary: '',
      });

      expect(prompt.split('\n\n')).toHaveLength(1);
    });
  });

  describe('formatMoodLog', () => {
    it('should list the scores that are present', () => {
      expect(
        formatMoodLog({ date: '2026-01-02', mood: 3, stress: 4, notes: 'exam week' }),
      ).toBe('2026-01-02: mood 3/5, stress 4/5. Notes: exam week');
    });

    it('should mark entries without scores', () => {
      expect(formatMoodLog({ date: '2026-01-02' })).toBe('2026-01-02: no scores');
    });
  });

  it('should put one log per line', () => {
    expect(
      buildMoodSummaryInput([
        { date: '2026-01-02', mood: 4 },
        { date: '2026-01-01', energy: 2 },
      ]),
    ).toBe('2026-01-02: mood 4/5\n2026-01-01: energy 2/5');
  });
});
