import { z } from 'zod';

// Structural checks only. Leaf values are never validated here: they are
// coerced (or defaulted) by the section writers. A record fails only when
// it, or one of its nested sections, is not a plain object. Null nested
// sections count as absent.

const section = z.object({}).passthrough().nullish();

export const PlayerRecordShape = z
  .object({
    combine: section,
    college: z
      .object({
        passing: section,
        rushing: section,
        receiving: section,
        defense: section,
        kicking: section,
        team: section,
        opp: section,
      })
      .passthrough()
      .nullish(),
    nflCareer: z
      .object({
        passing: section,
        rushing: section,
        receiving: section,
        defense: section,
        kicking: section,
        teamPerformance: section,
      })
      .passthrough()
      .nullish(),
    seasonal: z
      .object({
        last: section,
        worst: section,
        best: section,
        average: section,
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const GameContextShape = z.object({}).passthrough();

export const PlayStateShape = z.object({}).passthrough();

export function listIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
