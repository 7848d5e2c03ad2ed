/**
 * Leaderboard Repository Tests
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileLeaderboardRepository } from '../../src/repositories/leaderboard-repository';
import { Leaderboard, LeaderboardKind } from '../../src/models/leaderboard';

function weeklyLeaderboard(sequence: number): Leaderboard {
  return {
    kind: LeaderboardKind.WEEKLY,
    scope: 'weekly/poll_winner',
    sequence,
    run_id: `run-${sequence}`,
    units: [{ id: 'm1', label: 'Match 1' }, { id: 'm2' }],
    entries: [
      {
        entity_key: 'alice',
        display_name: 'Alice',
        cells: [
          { participated: true, score: 1, selection: 'CSK' },
          { participated: false, score: 0 },
        ],
        total: 1,
        dense_rank: 1,
        standard_rank: 1,
        movement: {
          entity_key: 'alice',
          dense: { kind: 'improved', by: 2 },
          standard: { kind: 'unchanged' },
        },
      },
    ],
    generated_at: '2025-04-14T18:30:00.000Z',
  };
}

describe('FileLeaderboardRepository', () => {
  let rootDir: string;
  let repository: FileLeaderboardRepository;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'leaderboards-'));
    repository = new FileLeaderboardRepository(rootDir);
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  describe('write', () => {
    it('should write the leaderboard under its scope and sequence', async () => {
      await repository.write(weeklyLeaderboard(3));

      const names = await fs.readdir(path.join(rootDir, 'weekly', 'poll_winner'));
      expect(names).toEqual(['3.json']);
    });
  });

  describe('remove', () => {
    it('should delete only the given sequence', async () => {
      await repository.write(weeklyLeaderboard(1));
      await repository.write(weeklyLeaderboard(2));

      await repository.remove('weekly/poll_winner', 2);

      const names = await fs.readdir(path.join(rootDir, 'weekly', 'poll_winner'));
      expect(names).toEqual(['1.json']);
    });

    it('should ignore a sequence that was never written', async () => {
      await expect(repository.remove('weekly/poll_winner', 7)).resolves.toBeUndefined();
    });
  });

  describe('findByScope', () => {
    it('should read back a written leaderboard', async () => {
      await repository.write(weeklyLeaderboard(2));

      await expect(repository.findByScope('weekly/poll_winner', 2)).resolves.toEqual(weeklyLeaderboard(2));
    });

    it('should return undefined for a missing sequence', async () => {
      await expect(repository.findByScope('weekly/poll_winner', 9)).resolves.toBeUndefined();
    });

    it('should reject a document that is not a leaderboard', async () => {
      const directory = path.join(rootDir, 'weekly', 'poll_winner');
      await fs.mkdir(directory, { recursive: true });
      await fs.writeFile(path.join(directory, '1.json'), '{"kind":"monthly"}');

      await expect(repository.findByScope('weekly/poll_winner', 1)).rejects.toThrow(
        /^Invalid leaderboard document /
      );
    });
  });

  describe('findAllByScope', () => {
    it('should return leaderboards ascending by numeric sequence', async () => {
      await repository.write(weeklyLeaderboard(10));
      await repository.write(weeklyLeaderboard(2));
      await repository.write(weeklyLeaderboard(1));

      const leaderboards = await repository.findAllByScope('weekly/poll_winner');

      expect(leaderboards.map((leaderboard) => leaderboard.sequence)).toEqual([1, 2, 10]);
    });

    it('should stop at the given sequence', async () => {
      await repository.write(weeklyLeaderboard(1));
      await repository.write(weeklyLeaderboard(2));
      await repository.write(weeklyLeaderboard(3));

      const leaderboards = await repository.findAllByScope('weekly/poll_winner', 2);

      expect(leaderboards.map((leaderboard) => leaderboard.sequence)).toEqual([1, 2]);
    });

    it('should ignore files that are not sequence documents', async () => {
      await repository.write(weeklyLeaderboard(1));
      await fs.writeFile(path.join(rootDir, 'weekly', 'poll_winner', 'notes.txt'), 'draft');

      await expect(repository.findAllByScope('weekly/poll_winner')).resolves.toHaveLength(1);
    });

    it('should return an empty list for an unknown scope', async () => {
      await expect(repository.findAllByScope('weekly/poll_margin')).resolves.toEqual([]);
    });
  });
});
