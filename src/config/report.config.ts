// Environment variables are loaded from `.env` once, on first read.

import * as dotenv from 'dotenv';
import { z } from 'zod';
import type { ReportOptions } from '../types/discipline.types';
import { ConfigurationError } from '../utils/errors';
import { LOG_LEVELS, type Level } from '../utils/logger';
import { DEFAULT_TOP_AUTHORS, DEFAULT_TOP_STUDENTS } from '../services/incident-metrics.service';

export const DEFAULT_DISTRICT_LABEL = 'District-wide';

const topLimitSchema = z.number().int().positive();
const labelSchema = z.string().trim().min(1);

const reportEnvSchema = z.object({
  DISCIPLINE_TOP_STUDENTS: z.coerce.number().pipe(topLimitSchema).default(DEFAULT_TOP_STUDENTS),
  DISCIPLINE_TOP_AUTHORS: z.coerce.number().pipe(topLimitSchema).default(DEFAULT_TOP_AUTHORS),
  DISCIPLINE_DISTRICT_LABEL: labelSchema.default(DEFAULT_DISTRICT_LABEL),
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('info'),
});

const reportOptionsSchema = z.object({
  topStudents: topLimitSchema.optional(),
  topAuthors: topLimitSchema.optional(),
  districtLabel: labelSchema.optional(),
});

type ReportEnvKey = keyof z.input<typeof reportEnvSchema>;
const REPORT_ENV_KEYS: readonly ReportEnvKey[] = [
  'DISCIPLINE_TOP_STUDENTS',
  'DISCIPLINE_TOP_AUTHORS',
  'DISCIPLINE_DISTRICT_LABEL',
  'LOG_LEVEL',
];

// Blank values count as unset
function pickReportEnv(env: NodeJS.ProcessEnv): Partial<Record<ReportEnvKey, string>> {
  const picked: Partial<Record<ReportEnvKey, string>> = {};
  for (const key of REPORT_ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') picked[key] = value;
  }
  return picked;
}

export interface ReportConfig {
  topStudents: number;
  topAuthors: number;
  districtLabel: string;
  logLevel: Level;
}

let cached: ReportConfig | null = null;
let envLoaded = false;

export function loadReportConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  const parsed = reportEnvSchema.safeParse(pickReportEnv(env));
  if (!parsed.success) {
    throw new ConfigurationError('Invalid discipline report environment', parsed.error.issues);
  }
  return {
    topStudents: parsed.data.DISCIPLINE_TOP_STUDENTS,
    topAuthors: parsed.data.DISCIPLINE_TOP_AUTHORS,
    districtLabel: parsed.data.DISCIPLINE_DISTRICT_LABEL,
    logLevel: parsed.data.LOG_LEVEL,
  };
}

export function getReportConfig(): ReportConfig {
  if (!envLoaded) {
    dotenv.config();
    envLoaded = true;
  }
  if (!cached) cached = loadReportConfig();
  return cached;
}

/** Explicit options win over the environment and are held to the same rules. */
export function resolveReportOptions(options: ReportOptions = {}): ReportConfig {
  const parsed = reportOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid discipline report options', parsed.error.issues);
  }
  const base = getReportConfig();
  return {
    ...base,
    topStudents: parsed.data.topStudents ?? base.topStudents,
    topAuthors: parsed.data.topAuthors ?? base.topAuthors,
    districtLabel: parsed.data.districtLabel ?? base.districtLabel,
  };
}

export function resetReportConfigForTests(): void {
  cached = null;
}
