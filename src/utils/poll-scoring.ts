/**
 * Poll Scoring Utilities
 *
 * Resolves poll exports into per-voter score records for one contest unit.
 *
 * Scoring Rules:
 * - Winner poll: a vote for the winning team scores the poll's points (default 1)
 * - Margin poll: a vote for the bucket containing the winning margin scores the
 *   poll's points (default 1)
 * - Playoff poll: each distinct correct pick scores the poll's points (default 0)
 * - Every other vote scores 0
 */

import teams from '../data/teams.json';
import {
  Margin,
  MarginBucket,
  MarginPoll,
  PlayoffPoll,
  PollAnswer,
  PollUser,
  WinnerPoll,
} from '../models/poll';
import { ScoreRecord } from '../models/score';
import { BadRequestError } from '../models/errors';

/**
 * Number of qualifiers a playoff prediction names
 */
export const PLAYOFF_PICKS = 4;

const DEFAULT_POINTS = 1;
const UNKNOWN_ANSWER = 'Unknown';

const TEAM_CODES: Readonly<Record<string, string>> = teams;

/**
 * Map a full team name to its short code, leaving unknown names as they are
 */
export function teamCode(name: string): string {
  return Object.prototype.hasOwnProperty.call(TEAM_CODES, name) ? TEAM_CODES[name] : name;
}

/**
 * Resolve the voter's entity key and display name
 *
 * @throws BadRequestError if the vote carries neither a username nor an id
 */
export function resolveVoter(user: PollUser): { entity_key: string; display_name: string } {
  const entityKey = user.username ?? user.id;
  if (!entityKey) {
    throw new BadRequestError('Vote is missing a username and user id');
  }

  return { entity_key: entityKey, display_name: user.globalName ?? entityKey };
}

function answerNames(answers: PollAnswer[]): Map<number, string> {
  return new Map(answers.map((answer) => [answer.id, answer.name]));
}

/**
 * Score a "predict the winner" poll
 */
export function scoreWinnerPoll(poll: WinnerPoll): ScoreRecord[] {
  const names = answerNames(poll.answers);
  const points = poll.points ?? DEFAULT_POINTS;

  return poll.votes.map((vote) => {
    const selection = teamCode(names.get(vote.answerId) ?? UNKNOWN_ANSWER);

    return {
      ...resolveVoter(vote.user),
      score: selection === poll.winner ? points : 0,
      selection,
    };
  });
}

/**
 * Parse a winning margin
 *
 * Examples:
 * - "14 runs" → { unit: 'runs', value: 14 }
 * - "3 wickets" → { unit: 'wickets', value: 3 }
 * - "Super Over" → { unit: 'super_over' }
 * - "by a mile" → undefined
 */
export function parseMargin(margin: string): Margin | undefined {
  const normalized = margin.toLowerCase().trim();

  if (normalized === 'super over') {
    return { unit: 'super_over' };
  }

  const match = /^(\d+)\s*(runs|wickets)/.exec(normalized);
  if (!match) {
    return undefined;
  }

  return { unit: match[2] === 'runs' ? 'runs' : 'wickets', value: parseInt(match[1], 10) };
}

function parseRange(
  pattern: RegExp,
  text: string
): { min: number; max?: number; open_ended: boolean } | undefined {
  const match = pattern.exec(text);
  if (!match) {
    return undefined;
  }

  return {
    min: parseInt(match[1], 10),
    max: match[2] === undefined ? undefined : parseInt(match[2], 10),
    open_ended: match[0].includes('+'),
  };
}

/**
 * Parse the margin bucket an answer option describes
 *
 * Examples:
 * - "Win by 11-20 runs OR by 9-10 wickets" → runs 11..20, wickets 9..10
 * - "Win by 61+ runs OR by 1 wicket" → runs 61+, wickets 1
 * - "Win by Super Over" → super over
 */
export function parseMarginBucket(answerName: string): MarginBucket {
  const text = answerName.toLowerCase();

  return {
    runs: parseRange(/(\d+)(?:-(\d+)|\+)?\s*runs?/, text),
    wickets: parseRange(/(\d+)(?:-(\d+)|\+)?\s*wickets?/, text),
    super_over: text.includes('super over'),
  };
}

/**
 * Check whether a margin falls inside a bucket
 *
 * A bounded range matches inclusively. A range without an upper bound,
 * whether "61+ runs" or "1 wicket", matches its minimum and above; the
 * first answer in poll order that matches is the winning one.
 */
export function bucketContains(bucket: MarginBucket, margin: Margin): boolean {
  if (margin.unit === 'super_over') {
    return bucket.super_over;
  }

  const range = margin.unit === 'runs' ? bucket.runs : bucket.wickets;
  if (!range) {
    return false;
  }

  if (range.max !== undefined) {
    return margin.value >= range.min && margin.value <= range.max;
  }
  return margin.value >= range.min;
}

/**
 * Short label of a bucket for the unit the match was decided by
 *
 * Examples: "11-20R", "61+R", "14R", "1-2W", "5+W", "SO"
 */
export function bucketLabel(bucket: MarginBucket, unit: Margin['unit']): string {
  if (bucket.super_over) {
    return 'SO';
  }

  const range = unit === 'runs' ? bucket.runs : unit === 'wickets' ? bucket.wickets : undefined;
  if (!range) {
    return UNKNOWN_ANSWER;
  }

  const suffix = unit === 'runs' ? 'R' : 'W';
  if (range.max !== undefined) {
    return `${range.min}-${range.max}${suffix}`;
  }
  return range.open_ended ? `${range.min}+${suffix}` : `${range.min}${suffix}`;
}

/**
 * Score a "predict the winning margin" poll
 *
 * @throws BadRequestError if the margin cannot be parsed
 */
export function scoreMarginPoll(poll: MarginPoll): ScoreRecord[] {
  const margin = parseMargin(poll.margin);
  if (!margin) {
    throw new BadRequestError(`Invalid margin format: '${poll.margin}'`);
  }

  const points = poll.points ?? DEFAULT_POINTS;
  const buckets = new Map(poll.answers.map((answer) => [answer.id, parseMarginBucket(answer.name)]));
  const winningAnswer = poll.answers.find((answer) => {
    const bucket = buckets.get(answer.id);
    return bucket !== undefined && bucketContains(bucket, margin);
  });

  return poll.votes.map((vote) => {
    const bucket = buckets.get(vote.answerId);

    return {
      ...resolveVoter(vote.user),
      score: winningAnswer !== undefined && vote.answerId === winningAnswer.id ? points : 0,
      selection: bucket ? bucketLabel(bucket, margin.unit) : UNKNOWN_ANSWER,
    };
  });
}

/**
 * Score one voter's playoff picks
 *
 * Picks are compared as a set: a team picked twice counts once.
 *
 * @returns Correct picks (sorted) and points earned
 */
export function scorePlayoffPicks(
  picks: string[],
  qualified: string[],
  pointsPerPick: number
): { correct: string[]; score: number } {
  const qualifiedSet = new Set(qualified);
  const correct = Array.from(new Set(picks))
    .filter((team) => qualifiedSet.has(team))
    .sort();

  return { correct, score: correct.length * pointsPerPick };
}

/**
 * Score a playoff qualifiers poll
 *
 * Votes are grouped per voter (by user id, falling back to username).
 *
 * @throws BadRequestError if the poll does not name exactly PLAYOFF_PICKS
 *         qualifiers or a voter picked more than PLAYOFF_PICKS teams
 */
export function scorePlayoffPoll(poll: PlayoffPoll): ScoreRecord[] {
  if (poll.qualifiedteams.length !== PLAYOFF_PICKS) {
    throw new BadRequestError(
      `Playoff poll must name exactly ${PLAYOFF_PICKS} qualified teams, got ${poll.qualifiedteams.length}`
    );
  }

  const names = answerNames(poll.answers);
  const pointsPerPick = poll.points ?? 0;
  const voters = new Map<string, { entity_key: string; display_name: string; picks: string[] }>();

  for (const vote of poll.votes) {
    const voter = resolveVoter(vote.user);
    const groupKey = vote.user.id ?? voter.entity_key;
    const entry = voters.get(groupKey) ?? { ...voter, picks: [] };

    entry.picks.push(teamCode(names.get(vote.answerId) ?? UNKNOWN_ANSWER));
    voters.set(groupKey, entry);
  }

  return Array.from(voters.values()).map((voter) => {
    const distinct = new Set(voter.picks);
    if (distinct.size > PLAYOFF_PICKS) {
      throw new BadRequestError(
        `Voter '${voter.entity_key}' picked ${distinct.size} teams, at most ${PLAYOFF_PICKS} allowed`
      );
    }

    const { score } = scorePlayoffPicks(voter.picks, poll.qualifiedteams, pointsPerPick);

    return {
      entity_key: voter.entity_key,
      display_name: voter.display_name,
      score,
      selection: Array.from(distinct).sort().join(', '),
    };
  });
}
