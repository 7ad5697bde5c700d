/**
 * @file sample-data.ts
 * @description Generates development data and clears every application table.
 */

import { err, ok, type Result } from "neverthrow";
import type { DataService } from "../data-service";
import { quoteIdentifier } from "../sql";
import {
  type CoachingPreferences,
  type ExerciseSessionRow,
  ExerciseSessions,
  type FitnessLevel,
  type UserProfileRow,
  UserProfiles,
  type UserRow,
  Users,
} from "./models";

const FIRST_NAMES = ["John", "Jane", "Mike", "Sarah", "David", "Emily", "Chris", "Lisa", "Alex", "Maria"];
const LAST_NAMES = ["Smith", "Johnson", "Williams", "Brown", "Jones", "Garcia", "Miller", "Davis", "Rodriguez", "Martinez"];
const EXERCISE_TYPES = ["plank", "side_plank", "dead_bug", "bird_dog", "glute_bridge", "hollow_hold"];
const FITNESS_LEVELS: FitnessLevel[] = ["beginner", "intermediate", "advanced"];
const PRIMARY_GOALS = ["strength", "endurance", "flexibility", "weight_loss", "general_fitness"];
const FEEDBACK_STYLES: CoachingPreferences["feedback_style"][] = ["encouraging", "technical", "balanced"];
const SESSION_DURATIONS = [15, 20, 30, 45, 60];

// Placeholder credential; sample accounts cannot log in.
const SAMPLE_PASSWORD_HASH = "sample-password-hash";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SampleDataOptions {
  users?: number;
  sessionsPerUser?: number;
  random?: () => number;
  now?: Date;
}

export interface SampleDataSummary {
  users: number;
  profiles: number;
  sessions: number;
}

function pick<T>(items: readonly T[], random: () => number): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) throw new RangeError("Cannot pick from an empty list");
  return item;
}

function between(min: number, max: number, random: () => number): number {
  return min + random() * (max - min);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Inserts `users` users, one profile each and `sessionsPerUser` completed exercise sessions per user.
 */
export async function populateSampleData(
  data: DataService,
  options: SampleDataOptions = {},
): Promise<Result<SampleDataSummary, Error>> {
  const random = options.random ?? Math.random;
  const now = options.now ?? new Date();
  const userCount = options.users ?? 10;
  const sessionsPerUser = options.sessionsPerUser ?? 20;
  // Keeps emails and usernames unique when populate runs more than once.
  const runTag = Math.floor(random() * 36 ** 4).toString(36);

  const userIds: number[] = [];
  for (let i = 0; i < userCount; i++) {
    const firstName = pick(FIRST_NAMES, random);
    const lastName = pick(LAST_NAMES, random);
    const handle = `${firstName.toLowerCase()}${lastName.toLowerCase()}${i}${runTag}`;
    const user: Partial<UserRow> = {
      email: `${firstName.toLowerCase()}.${lastName.toLowerCase()}${i}${runTag}@example.com`,
      username: handle,
      password_hash: SAMPLE_PASSWORD_HASH,
      is_verified: true,
      role: random() < 0.5 ? "free" : "premium",
      first_name: firstName,
      last_name: lastName,
      fitness_level: pick(FITNESS_LEVELS, random),
    };
    const inserted = await data.insert(Users, user);
    if (inserted.isErr()) return err(inserted.error);
    userIds.push(inserted.value.id);
  }

  const profiles: Partial<UserProfileRow>[] = userIds.map((userId) => ({
    user_id: userId,
    training_goals: {
      primary: pick(PRIMARY_GOALS, random),
      secondary: ["core_stability", "posture_improvement"],
      target_sessions_per_week: 2 + Math.floor(random() * 5),
    },
    preferred_session_duration: pick(SESSION_DURATIONS, random),
    health_considerations: { injuries: [], medical_conditions: [], limitations: [] },
    coaching_preferences: {
      feedback_style: pick(FEEDBACK_STYLES, random),
      correction_frequency: "end_of_set",
      difficulty_progression: "adaptive",
    },
  }));
  const profileCount = await data.batchWrite(UserProfiles, profiles);
  if (profileCount.isErr()) return err(profileCount.error);

  const sessions: Partial<ExerciseSessionRow>[] = [];
  for (const userId of userIds) {
    for (let i = 0; i < sessionsPerUser; i++) {
      const startedAt = new Date(now.getTime() - (1 + Math.floor(random() * 90)) * DAY_MS);
      const duration = 300 + Math.floor(random() * 3300);
      const stability = round2(between(60, 95, random));
      const formQuality = round2(between(65, 98, random));
      const endurance = round2(between(70, 95, random));
      sessions.push({
        user_id: userId,
        exercise_type: pick(EXERCISE_TYPES, random),
        started_at: startedAt.toISOString(),
        completed_at: new Date(startedAt.getTime() + duration * 1000).toISOString(),
        duration_seconds: duration,
        stability_score: stability,
        form_quality_score: formQuality,
        endurance_score: endurance,
        overall_score: round2((stability + formQuality + endurance) / 3),
        personal_best: random() < 0.05,
        sensor_summary: {
          samples: Math.floor(duration * 10),
          mean_tilt_deg: round2(between(0.5, 4, random)),
          max_tilt_deg: round2(between(4, 12, random)),
        },
      });
    }
  }
  const sessionCount = await data.batchWrite(ExerciseSessions, sessions);
  if (sessionCount.isErr()) return err(sessionCount.error);

  return ok({ users: userIds.length, profiles: profileCount.value, sessions: sessionCount.value });
}

/**
 * Deletes every row of the application tables, children first, in one transaction.
 * @returns Rows deleted per table.
 */
export async function clearAllData(data: DataService): Promise<Result<Record<string, number>, Error>> {
  const tables = [ExerciseSessions, UserProfiles, Users];
  const cleared = await data.withSession(async (session) => {
    const counts: Record<string, number> = {};
    for (const model of tables) {
      const result = await session.execute(`DELETE FROM ${quoteIdentifier(model.tableName, session.dbType)}`);
      counts[model.tableName] = result.rowCount;
    }
    return counts;
  });
  if (cleared.isOk()) {
    for (const model of tables) await data.invalidate(model.cachePrefix);
  }
  return cleared;
}
