import { afterEach, describe, expect, it } from "vitest";
import { CacheManager } from "../src/cache";
import { ConnectionManager } from "../src/connection-manager";
import { DataService } from "../src/data-service";
import { HealthMonitor } from "../src/health";
import { generateMigration } from "../src/migrations";
import {
  clearAllData,
  ExerciseSessions,
  getProfile,
  mergeProfile,
  populateSampleData,
  updateProfile,
  UserProfiles,
  Users,
} from "../src/schema";
import { DBType } from "../src/types";
import { cacheConfig, connectionConfig, silentLogger } from "./helpers";

const services: DataService[] = [];

async function setup(): Promise<DataService> {
  const logger = silentLogger();
  const connections = new ConnectionManager(connectionConfig(), { logger });
  const health = new HealthMonitor(connections, { slowQueryThresholdMs: 1000, logger });
  const cache = new CacheManager(cacheConfig(), { logger, remote: null });
  const data = new DataService({ connections, health, cache, logger });
  services.push(data);

  (await connections.initialize())._unsafeUnwrap();
  const created = await data.withSession(async (session) => {
    for (const model of [Users, UserProfiles, ExerciseSessions]) {
      for (const statement of generateMigration(model, DBType.SQLite).up) await session.execute(statement);
    }
  });
  created._unsafeUnwrap();
  return data;
}

async function addUser(data: DataService, name: string): Promise<number> {
  const user = await data.insert(Users, { email: `${name}@example.com`, username: name, password_hash: "test-hash" });
  return user._unsafeUnwrap().id;
}

afterEach(async () => {
  for (const data of services.splice(0)) await data.close();
});

describe("mergeProfile", () => {
  const current = {
    training_goals: { primary: "strength", secondary: ["posture"], target_sessions_per_week: 4 },
    preferred_session_duration: 45,
    health_considerations: null,
    coaching_preferences: {
      feedback_style: "encouraging" as const,
      correction_frequency: "immediate" as const,
      difficulty_progression: "fixed" as const,
    },
  };

  it("replaces only the nested fields present in the patch", () => {
    const merged = mergeProfile(current, { coaching_preferences: { feedback_style: "technical" } });

    expect(merged.coaching_preferences).toEqual({
      feedback_style: "technical",
      correction_frequency: "immediate",
      difficulty_progression: "fixed",
    });
    expect(merged.training_goals).toBe(current.training_goals);
    expect(merged.preferred_session_duration).toBe(45);
  });

  it("starts an unset nested object from its defaults", () => {
    const merged = mergeProfile(current, { health_considerations: { injuries: ["left knee"] } });

    expect(merged.health_considerations).toEqual({ injuries: ["left knee"], medical_conditions: [], limitations: [] });
  });

  it("leaves everything as stored for an empty patch", () => {
    expect(mergeProfile(current, {})).toEqual(current);
  });
});

describe("profiles", () => {
  it("merges a partial update and refreshes the cached profile", async () => {
    const data = await setup();
    const userId = await addUser(data, "ana");
    await data.insert(UserProfiles, {
      user_id: userId,
      training_goals: { primary: "endurance", secondary: [], target_sessions_per_week: 3 },
      coaching_preferences: { feedback_style: "encouraging", correction_frequency: "immediate", difficulty_progression: "fixed" },
    });
    expect((await getProfile(data, userId))._unsafeUnwrap()?.coaching_preferences?.feedback_style).toBe("encouraging");

    const updated = (await updateProfile(data, userId, { coaching_preferences: { feedback_style: "technical" } }))._unsafeUnwrap();

    expect(updated).toMatchObject({
      user_id: userId,
      preferred_session_duration: 30,
      training_goals: { primary: "endurance", secondary: [], target_sessions_per_week: 3 },
      coaching_preferences: { feedback_style: "technical", correction_frequency: "immediate", difficulty_progression: "fixed" },
      health_considerations: null,
    });
    expect((await getProfile(data, userId))._unsafeUnwrap()?.coaching_preferences?.feedback_style).toBe("technical");
  });

  it("returns null for a user without a profile", async () => {
    const data = await setup();
    const userId = await addUser(data, "ben");

    expect((await updateProfile(data, userId, { preferred_session_duration: 20 }))._unsafeUnwrap()).toBeNull();
    expect((await getProfile(data, userId))._unsafeUnwrap()).toBeNull();
  });

  it("rejects invalid values and unknown fields", async () => {
    const data = await setup();

    const negative = await updateProfile(data, 1, { preferred_session_duration: -5 });
    expect(negative._unsafeUnwrapErr()).toMatchObject({ kind: "invalid" });
    expect(negative._unsafeUnwrapErr().message).toBe(
      "Invalid profile update: preferred_session_duration: Number must be greater than 0",
    );

    const unknown = await updateProfile(data, 1, { theme: "dark" });
    expect(unknown._unsafeUnwrapErr().message).toBe(
      "Invalid profile update: (root): Unrecognized key(s) in object: 'theme'",
    );
  });
});

describe("sample data", () => {
  it("creates users with one profile each and their sessions", async () => {
    const data = await setup();

    const summary = await populateSampleData(data, { users: 3, sessionsPerUser: 4, random: () => 0.5 });

    expect(summary._unsafeUnwrap()).toEqual({ users: 3, profiles: 3, sessions: 12 });
    const first = (await data.findById(Users, 1))._unsafeUnwrap();
    expect(first).toMatchObject({
      email: "emily.garcia0i000@example.com",
      username: "emilygarcia0i000",
      role: "premium",
      fitness_level: "intermediate",
      is_active: true,
      is_verified: true,
    });
    const sessions = (await data.findMany(ExerciseSessions, { user_id: 1 }))._unsafeUnwrap();
    expect(sessions).toHaveLength(4);
    expect(sessions[0]?.personal_best).toBe(false);
  });

  it("clears every table and reports the rows removed", async () => {
    const data = await setup();
    (await populateSampleData(data, { users: 3, sessionsPerUser: 4 }))._unsafeUnwrap();

    const cleared = await clearAllData(data);

    expect(cleared._unsafeUnwrap()).toEqual({ exercise_sessions: 12, user_profiles: 3, users: 3 });
    expect((await data.findMany(Users))._unsafeUnwrap()).toEqual([]);
  });
});
