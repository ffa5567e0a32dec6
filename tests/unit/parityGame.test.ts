import {
  DRAW_MAX,
  DRAW_MIN,
  determineWinner,
  drawNumber,
  parityOf,
} from '../../src/shared/engine/parityGame';
import type { ParityChoice } from '../../src/shared/types/league';

const choices = (...entries: Array<[string, ParityChoice]>) => new Map(entries);

describe('parityGame', () => {
  it('draws integers within [1, 10]', () => {
    for (let i = 0; i < 200; i++) {
      const value = drawNumber();
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(DRAW_MIN);
      expect(value).toBeLessThanOrEqual(DRAW_MAX);
    }
  });

  it('classifies parity', () => {
    expect(parityOf(1)).toBe('odd');
    expect(parityOf(4)).toBe('even');
    expect(parityOf(10)).toBe('even');
  });

  it('awards the player whose choice matches the drawn parity', () => {
    const outcome = determineWinner(7, choices(['P1', 'even'], ['P2', 'odd']));

    expect(outcome).toEqual({
      drawnNumber: 7,
      parity: 'odd',
      winnerId: 'P2',
      scores: { P1: 0, P2: 3 },
      collision: false,
    });
  });

  it('favors the first entry when both players picked the matching symbol', () => {
    const outcome = determineWinner(2, choices(['P2', 'even'], ['P1', 'even']));

    expect(outcome.winnerId).toBe('P2');
    expect(outcome.scores).toEqual({ P2: 3, P1: 0 });
    expect(outcome.collision).toBe(true);
  });

  it('has no winner when both players picked the non-matching symbol', () => {
    const outcome = determineWinner(3, choices(['P1', 'even'], ['P2', 'even']));

    expect(outcome.winnerId).toBeNull();
    expect(outcome.scores).toEqual({ P1: 0, P2: 0 });
    expect(outcome.collision).toBe(true);
  });
});
