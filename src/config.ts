/**
 * Runtime configuration, read from the environment (and .env via dotenv).
 *
 *   API_PORT              HTTP port (default 3001)
 *   CORS_ORIGINS          comma-separated allowed origins
 *   SCHOOL_DATA_FILE      JSON document holding all scheduling data
 *   DISTRIBUTION_SEED     integer; fixes every random tiebreak when set
 *   COURSE_TYPE_PRIORITY  comma-separated course types, first distributed first
 */

import dotenv from "dotenv";
import path from "path";
import { CourseType, DEFAULT_COURSE_TYPE_PRIORITY, isCourseType } from "./domain/course";
import { DEFAULT_DATA_FILE } from "./stores/schoolDatabase";

dotenv.config();

export interface SchedulerConfig {
  port: number;
  corsOrigins: string[];
  dataFile: string;
  distributionSeed: number | null;
  courseTypePriority: CourseType[];
}

const DEFAULT_PORT = 3001;
const DEFAULT_CORS_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

function parseList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parsePort(value: string | undefined): number {
  if (!value) {
    return DEFAULT_PORT;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    console.warn(`[config] Ignoring invalid API_PORT "${value}", using ${DEFAULT_PORT}`);
    return DEFAULT_PORT;
  }
  return port;
}

function parseSeed(value: string | undefined): number | null {
  if (!value || value.trim() === "") {
    return null;
  }
  const seed = Number(value);
  if (!Number.isInteger(seed)) {
    console.warn(`[config] Ignoring non-integer DISTRIBUTION_SEED "${value}"`);
    return null;
  }
  return seed;
}

function parsePriority(value: string | undefined): CourseType[] {
  const entries = parseList(value).map((item) => item.toUpperCase());
  if (entries.length === 0) {
    return DEFAULT_COURSE_TYPE_PRIORITY;
  }

  const unknown = entries.filter((item) => !isCourseType(item));
  if (unknown.length > 0) {
    console.warn(`[config] Ignoring unknown course types in COURSE_TYPE_PRIORITY: ${unknown.join(", ")}`);
  }

  const priority = [...new Set(entries.filter(isCourseType))];
  // Types left out still run, after the listed ones
  for (const courseType of DEFAULT_COURSE_TYPE_PRIORITY) {
    if (!priority.includes(courseType)) {
      priority.push(courseType);
    }
  }
  return priority;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SchedulerConfig {
  const corsOrigins = parseList(env.CORS_ORIGINS);

  return {
    port: parsePort(env.API_PORT),
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : DEFAULT_CORS_ORIGINS,
    dataFile: env.SCHOOL_DATA_FILE ? path.resolve(env.SCHOOL_DATA_FILE) : DEFAULT_DATA_FILE,
    distributionSeed: parseSeed(env.DISTRIBUTION_SEED),
    courseTypePriority: parsePriority(env.COURSE_TYPE_PRIORITY),
  };
}
