/**
 * @file profile.ts
 * @description Profile reads and partial updates. Updates are merged field by field over the stored
 * profile, never overlaid wholesale.
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { DataService } from "../data-service";
import { QueryError } from "../errors";
import {
  type CoachingPreferences,
  type HealthConsiderations,
  type TrainingGoals,
  type UserProfileRow,
  UserProfiles,
} from "./models";

export const profilePatchSchema = z
  .object({
    training_goals: z
      .object({
        primary: z.string().min(1),
        secondary: z.array(z.string()),
        target_sessions_per_week: z.number().int().min(0).max(14),
      })
      .partial()
      .strict()
      .optional(),
    preferred_session_duration: z.number().int().positive().optional(),
    health_considerations: z
      .object({
        injuries: z.array(z.string()),
        medical_conditions: z.array(z.string()),
        limitations: z.array(z.string()),
      })
      .partial()
      .strict()
      .optional(),
    coaching_preferences: z
      .object({
        feedback_style: z.enum(["encouraging", "technical", "balanced"]),
        correction_frequency: z.enum(["immediate", "end_of_set", "end_of_session"]),
        difficulty_progression: z.enum(["adaptive", "fixed"]),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

export type ProfilePatch = z.infer<typeof profilePatchSchema>;

export const DEFAULT_TRAINING_GOALS: TrainingGoals = {
  primary: "general_fitness",
  secondary: [],
  target_sessions_per_week: 3,
};

export const DEFAULT_HEALTH_CONSIDERATIONS: HealthConsiderations = {
  injuries: [],
  medical_conditions: [],
  limitations: [],
};

export const DEFAULT_COACHING_PREFERENCES: CoachingPreferences = {
  feedback_style: "balanced",
  correction_frequency: "end_of_set",
  difficulty_progression: "adaptive",
};

type MergeableFields = Pick<
  UserProfileRow,
  "training_goals" | "preferred_session_duration" | "health_considerations" | "coaching_preferences"
>;

/**
 * Applies `patch` to `current`. Fields absent from the patch keep their stored value; a nested
 * object that was never set starts from its defaults.
 */
export function mergeProfile(current: MergeableFields, patch: ProfilePatch): MergeableFields {
  const goals = patch.training_goals;
  const health = patch.health_considerations;
  const coaching = patch.coaching_preferences;
  const baseGoals = current.training_goals ?? DEFAULT_TRAINING_GOALS;
  const baseHealth = current.health_considerations ?? DEFAULT_HEALTH_CONSIDERATIONS;
  const baseCoaching = current.coaching_preferences ?? DEFAULT_COACHING_PREFERENCES;

  return {
    training_goals: goals
      ? {
          primary: goals.primary ?? baseGoals.primary,
          secondary: goals.secondary ?? baseGoals.secondary,
          target_sessions_per_week: goals.target_sessions_per_week ?? baseGoals.target_sessions_per_week,
        }
      : current.training_goals,
    preferred_session_duration: patch.preferred_session_duration ?? current.preferred_session_duration,
    health_considerations: health
      ? {
          injuries: health.injuries ?? baseHealth.injuries,
          medical_conditions: health.medical_conditions ?? baseHealth.medical_conditions,
          limitations: health.limitations ?? baseHealth.limitations,
        }
      : current.health_considerations,
    coaching_preferences: coaching
      ? {
          feedback_style: coaching.feedback_style ?? baseCoaching.feedback_style,
          correction_frequency: coaching.correction_frequency ?? baseCoaching.correction_frequency,
          difficulty_progression: coaching.difficulty_progression ?? baseCoaching.difficulty_progression,
        }
      : current.coaching_preferences,
  };
}

export function profileCacheKey(userId: number): string {
  return `${UserProfiles.cachePrefix}user:${userId}`;
}

export async function getProfile(
  data: DataService,
  userId: number,
  ttlSeconds?: number,
): Promise<Result<UserProfileRow | null, Error>> {
  return data.cachedRead(profileCacheKey(userId), ttlSeconds, async (session) => {
    const rows = await session.query("SELECT * FROM user_profiles WHERE user_id = ?", [userId]);
    const row = rows[0];
    return row ? UserProfiles.hydrate(row) : null;
  });
}

/**
 * Validates and applies a partial profile update.
 * @returns The stored profile after the update, or null when the user has no profile.
 */
export async function updateProfile(
  data: DataService,
  userId: number,
  patch: unknown,
): Promise<Result<UserProfileRow | null, Error>> {
  const parsed = profilePatchSchema.safeParse(patch);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    return err(new QueryError("invalid", `Invalid profile update: ${issues.join("; ")}`));
  }

  const existing = await data.findMany(UserProfiles, { user_id: userId }, { limit: 1 });
  if (existing.isErr()) return err(existing.error);
  const current = existing.value[0];
  if (!current) return ok(null);

  // Also drops the profile cache key, which lives under the same table prefix.
  return data.update(UserProfiles, current.id, mergeProfile(current, parsed.data));
}
