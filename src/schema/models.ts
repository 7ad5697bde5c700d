/**
 * @file models.ts
 * @description Application tables. Importing this module registers them for schema autogeneration,
 * in dependency order.
 */

import { defineModel } from "../model";
import { DataTypes } from "../types";

export type UserRole = "free" | "premium" | "admin";
export type FitnessLevel = "beginner" | "intermediate" | "advanced";

export interface UserRow {
  id: number;
  email: string;
  username: string;
  password_hash: string;
  is_active: boolean;
  is_verified: boolean;
  role: UserRole;
  first_name: string | null;
  last_name: string | null;
  fitness_level: FitnessLevel | null;
  created_at: string;
  updated_at: string;
}

export interface TrainingGoals {
  primary: string;
  secondary: string[];
  target_sessions_per_week: number;
}

export interface HealthConsiderations {
  injuries: string[];
  medical_conditions: string[];
  limitations: string[];
}

export interface CoachingPreferences {
  feedback_style: "encouraging" | "technical" | "balanced";
  correction_frequency: "immediate" | "end_of_set" | "end_of_session";
  difficulty_progression: "adaptive" | "fixed";
}

export interface UserProfileRow {
  id: number;
  user_id: number;
  training_goals: TrainingGoals | null;
  preferred_session_duration: number;
  health_considerations: HealthConsiderations | null;
  coaching_preferences: CoachingPreferences | null;
  created_at: string;
  updated_at: string;
}

export interface SensorSummary {
  samples: number;
  mean_tilt_deg: number;
  max_tilt_deg: number;
}

export interface ExerciseSessionRow {
  id: number;
  user_id: number;
  exercise_type: string;
  started_at: string;
  completed_at: string | null;
  duration_seconds: number;
  stability_score: number | null;
  form_quality_score: number | null;
  endurance_score: number | null;
  overall_score: number | null;
  personal_best: boolean;
  sensor_summary: SensorSummary | null;
  created_at: string;
}

export const Users = defineModel<UserRow>({
  tableName: "users",
  columns: {
    id: { type: DataTypes.INTEGER },
    email: { type: DataTypes.STRING, required: true, unique: true },
    username: { type: DataTypes.STRING, required: true, unique: true },
    password_hash: { type: DataTypes.STRING, required: true },
    is_active: { type: DataTypes.BOOLEAN, required: true, defaultValue: true },
    is_verified: { type: DataTypes.BOOLEAN, required: true, defaultValue: false },
    role: { type: DataTypes.STRING, required: true, defaultValue: "free" },
    first_name: { type: DataTypes.STRING },
    last_name: { type: DataTypes.STRING },
    fitness_level: { type: DataTypes.STRING },
  },
  timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
});

export const UserProfiles = defineModel<UserProfileRow>({
  tableName: "user_profiles",
  columns: {
    id: { type: DataTypes.INTEGER },
    user_id: {
      type: DataTypes.INTEGER,
      required: true,
      unique: true,
      references: { table: "users", onDelete: "CASCADE" },
    },
    training_goals: { type: DataTypes.JSON },
    preferred_session_duration: { type: DataTypes.INTEGER, required: true, defaultValue: 30 },
    health_considerations: { type: DataTypes.JSON },
    coaching_preferences: { type: DataTypes.JSON },
  },
  timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
});

export const ExerciseSessions = defineModel<ExerciseSessionRow>({
  tableName: "exercise_sessions",
  columns: {
    id: { type: DataTypes.INTEGER },
    user_id: {
      type: DataTypes.INTEGER,
      required: true,
      index: "idx_exercise_sessions_user_id",
      references: { table: "users", onDelete: "CASCADE" },
    },
    exercise_type: { type: DataTypes.STRING, required: true },
    started_at: { type: DataTypes.DATETIME, required: true },
    completed_at: { type: DataTypes.DATETIME },
    duration_seconds: { type: DataTypes.INTEGER, required: true, defaultValue: 0 },
    stability_score: { type: DataTypes.FLOAT },
    form_quality_score: { type: DataTypes.FLOAT },
    endurance_score: { type: DataTypes.FLOAT },
    overall_score: { type: DataTypes.FLOAT },
    personal_best: { type: DataTypes.BOOLEAN, required: true, defaultValue: false },
    sensor_summary: { type: DataTypes.JSON },
  },
  timestamps: { createdAt: "created_at" },
});
