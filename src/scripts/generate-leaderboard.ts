/**
 * Leaderboard Generation Script
 *
 * Runs one leaderboard job from a request file:
 *
 *   pollrank-generate jobs/week3-winner.json
 *
 * Prints the job response body and exits non-zero when the job fails.
 */

import { promises as fs } from 'fs';
import { handler } from '../handlers/leaderboard-handler';
import { closePool } from '../config/database';
import { JobResult } from '../models/response';

/**
 * Read a job request file and run it
 */
export async function generateFromFile(requestPath: string): Promise<JobResult> {
  const text = await fs.readFile(requestPath, 'utf8');
  const request: unknown = JSON.parse(text);
  return handler(request);
}

// Run if called directly
if (require.main === module) {
  const requestPath = process.argv[2];

  if (!requestPath) {
    console.error('Usage: pollrank-generate <job-request.json>');
    process.exit(1);
  }

  generateFromFile(requestPath)
    .then(async (result) => {
      await closePool();
      console.log(result.body);
      process.exit(result.statusCode === 200 ? 0 : 1);
    })
    .catch(async (error: unknown) => {
      await closePool();
      console.error('Leaderboard generation failed:', error);
      process.exit(1);
    });
}
