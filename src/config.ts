import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_FPS, DEFAULT_SAMPLE_RATE, DEFAULT_START_CHANNEL, MAX_STEP_TIME_MS } from './fseq/constants.js';

const encoderSchema = z
  .object({
    sampleRate: z.number().int().min(1).max(384_000).default(DEFAULT_SAMPLE_RATE),
    fps: z.number().int().min(Math.ceil(1000 / MAX_STEP_TIME_MS)).max(1000).default(DEFAULT_FPS),
    startChannel: z.number().int().min(0).default(DEFAULT_START_CHANNEL),
    producer: z.string().min(1).max(200).default('fseq-audio encoder'),
  })
  .default({});

const outputSchema = z
  .object({
    atomic: z.boolean().default(true),
  })
  .default({});

export const configSchema = z.object({
  encoder: encoderSchema,
  output: outputSchema,
});

export type AppConfig = z.infer<typeof configSchema>;

let cachedConfig: AppConfig | null = null;

function defaultConfigPath(): string {
  return path.resolve(process.env.FSEQ_AUDIO_CONFIG ?? 'config.json');
}

export async function loadConfig(configPath = defaultConfigPath()): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  let raw: unknown = {};
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') throw error;
  }
  const parsed = configSchema.parse(raw);
  cachedConfig = parsed;
  return parsed;
}

export function reloadConfig(): void {
  cachedConfig = null;
}
