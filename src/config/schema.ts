/**
 * @fileoverview Configuration schema
 *
 * Zod schemas for the YAML config file. Every section and key is optional in
 * the file; missing values fall back to DEFAULT_CONFIG.
 */

import { z } from 'zod';

const PositiveInt = z.number().int().positive();
const NonNegativeInt = z.number().int().nonnegative();
const SizeString = z.string().regex(/^\d+(?:\.\d+)?\s*(?:B|KB|MB|GB|TB)$/i, 'expected a size such as 8GB');

export const FactCacheSchema = z.object({
  dir: z.string().min(1),
  maxAgeDays: NonNegativeInt,
}).strict();

export const BenchmarkSchema = z.object({
  dir: z.string().min(1),
  playbook: z.string().min(1),
  keep: PositiveInt,
}).strict();

export const UpdatesSchema = z.object({
  stampFile: z.string().min(1),
  intervalDays: NonNegativeInt,
  remote: z.string().min(1),
  branch: z.string().min(1),
}).strict();

export const VerifySchema = z.object({
  roles: z.array(z.string().min(1)),
  optionalTools: z.array(z.string().min(1)),
}).strict();

export const KeysSchema = z.object({
  windowsHome: z.string().min(1).nullable(),
  usersRoot: z.string().min(1),
  sshDir: z.string().min(1),
  gpgDir: z.string().min(1).nullable(),
}).strict();

export const WslSchema = z.object({
  memory: SizeString,
  processors: PositiveInt,
  swap: SizeString,
  localhostForwarding: z.boolean(),
}).strict();

export const DownloadsSchema = z.object({
  attempts: PositiveInt,
  delayMs: NonNegativeInt,
  installDir: z.string().min(1),
}).strict();

export const ToolPinSchema = z.object({
  version: z.string().regex(/^\d+\.\d+\.\d+$/, 'expected a version such as 1.31.2'),
}).strict();

export const DevenvConfigSchema = z.object({
  factCache: FactCacheSchema,
  benchmark: BenchmarkSchema,
  updates: UpdatesSchema,
  verify: VerifySchema,
  keys: KeysSchema,
  wsl: WslSchema,
  downloads: DownloadsSchema,
  tools: z.record(z.string(), ToolPinSchema),
}).strict();

/** Shape accepted in the YAML file: every section and key optional. */
export const DevenvConfigFileSchema = z.object({
  factCache: FactCacheSchema.partial(),
  benchmark: BenchmarkSchema.partial(),
  updates: UpdatesSchema.partial(),
  verify: VerifySchema.partial(),
  keys: KeysSchema.partial(),
  wsl: WslSchema.partial(),
  downloads: DownloadsSchema.partial(),
  tools: z.record(z.string(), ToolPinSchema),
}).strict().partial();

export type DevenvConfig = z.infer<typeof DevenvConfigSchema>;
export type DevenvConfigFile = z.infer<typeof DevenvConfigFileSchema>;
