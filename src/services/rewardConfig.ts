import { z } from "zod";
import type { TournamentStore } from "../db/store.js";
import type { RewardConfig } from "../@types/reward.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { isTerminal } from "./tournamentStateMachine.js";
import { getTournament } from "./tournamentService.js";

export const SKILL_CATEGORIES = ["PHYSICAL", "TECHNICAL", "MENTAL"] as const;
export const BADGE_RARITIES = [
  "COMMON",
  "UNCOMMON",
  "RARE",
  "EPIC",
  "LEGENDARY",
] as const;

/** XP per skill point when a category has no explicit rate */
export const DEFAULT_XP_PER_SKILL_POINT = 10;

const skillMappingSchema = z
  .object({
    skill: z.string().trim().min(1).max(64),
    weight: z.number().min(0.1).max(5).default(1),
    category: z.enum(SKILL_CATEGORIES).default("PHYSICAL"),
    // Skills are opt-in per tournament
    enabled: z.boolean().default(false),
  })
  .strict();

const badgeSchema = z
  .object({
    badgeType: z.string().trim().min(1).max(64),
    icon: z.string().min(1).max(16).default("🏆"),
    title: z.string().trim().min(1).max(128),
    description: z.string().max(500).nullable().default(null),
    rarity: z.enum(BADGE_RARITIES).default("COMMON"),
    enabled: z.boolean().default(true),
  })
  .strict();

const placementRewardSchema = z
  .object({
    badges: z.array(badgeSchema).default([]),
    credits: z.number().int().min(0).default(0),
    xpMultiplier: z.number().min(0).max(5).default(1),
  })
  .strict();

const rate = z.number().min(0).max(1000).default(DEFAULT_XP_PER_SKILL_POINT);

export const rewardConfigSchema = z
  .object({
    skillMappings: z.array(skillMappingSchema).min(1).max(50),
    firstPlace: placementRewardSchema.default({}),
    secondPlace: placementRewardSchema.default({}),
    thirdPlace: placementRewardSchema.default({}),
    top25Percent: placementRewardSchema.default({}),
    participation: placementRewardSchema.default({}),
    xpPerSkillPoint: z
      .object({ PHYSICAL: rate, TECHNICAL: rate, MENTAL: rate })
      .strict()
      .default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (!config.skillMappings.some((mapping) => mapping.enabled)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["skillMappings"],
        message: "At least one skill must be enabled",
      });
    }
    const seen = new Set<string>();
    config.skillMappings.forEach((mapping, index) => {
      if (seen.has(mapping.skill)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["skillMappings", index, "skill"],
          message: `Duplicate skill ${mapping.skill}`,
        });
      }
      seen.add(mapping.skill);
    });
  });

export type RewardConfigInput = z.input<typeof rewardConfigSchema>;

/**
 * Validate a reward configuration. A config without an enabled skill never
 * gets past this point.
 */
export function parseRewardConfig(input: unknown): RewardConfig {
  const parsed = rewardConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid reward config: ${details}`);
  }
  return parsed.data;
}

export async function saveRewardConfig(
  store: TournamentStore,
  tournamentId: string,
  input: unknown,
): Promise<RewardConfig> {
  const config = parseRewardConfig(input);
  const tournament = await getTournament(store, tournamentId);
  if (isTerminal(tournament.status)) {
    throw new ValidationError(
      `Reward config is frozen once a tournament is ${tournament.status}`,
      { tournamentId },
    );
  }
  await store.saveRewardConfig(tournamentId, config);
  console.log(`[Tournament ${tournamentId}] Reward config saved`);
  return config;
}

export async function getRewardConfig(
  store: TournamentStore,
  tournamentId: string,
): Promise<RewardConfig> {
  await getTournament(store, tournamentId);
  const config = await store.getRewardConfig(tournamentId);
  if (!config) {
    throw new NotFoundError(`No reward config for tournament ${tournamentId}`, {
      tournamentId,
    });
  }
  return config;
}
