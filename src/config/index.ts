/**
 * Configuration Module
 * ====================
 *
 * Bridge configuration: zod schema with defaults, loaded from an optional
 * JSON file (BRIDGE_CONFIG_FILE) with environment variables on top.
 *
 * Environment variables:
 *   BRIDGE_CONFIG_FILE        path to a JSON config file
 *   BRIDGE_POLL_INTERVAL_MS   initializer poll interval
 *   BRIDGE_READING_PAUSE_MS   pause between two discovery reads
 *   LOG_LEVEL / LOG_FORMAT / LOG_DIR
 *   MQTT_BROKER_URL / MQTT_TOPIC_PREFIX
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError, describeError } from '../bridge/errors';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_READING_PAUSE_MS } from '../bridge/datapoint-initializer';
import { ItemBindingSchema } from '../providers/configured-provider';

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']).optional().default('info'),
  format: z.enum(['json', 'pretty']).optional().default('json'),
  logDir: z.string().min(1).optional()
});

export const MqttConfigSchema = z.object({
  brokerUrl: z.string().url().optional().default('mqtt://localhost:1883'),
  topicPrefix: z.string().min(1).regex(/^[^#+]+$/, 'must not contain MQTT wildcards').optional().default('bridge'),
  qos: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional().default(0)
});

export const BridgeConfigSchema = z.object({
  pollIntervalMs: z.number().int().min(10).max(60000).optional().default(DEFAULT_POLL_INTERVAL_MS),
  readingPauseMs: z.number().int().min(0).max(10000).optional().default(DEFAULT_READING_PAUSE_MS),
  logging: LoggingConfigSchema.optional().default({}),
  mqtt: MqttConfigSchema.optional().default({}),
  bindings: z.array(ItemBindingSchema).optional().default([])
});

export type BridgeConfig = z.output<typeof BridgeConfigSchema>;
export type MqttConfig = z.output<typeof MqttConfigSchema>;

export function parseConfig(input: unknown): BridgeConfig {
  const result = BridgeConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

export function readConfigFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError([`${filePath}: ${describeError(error)}`]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError([`${filePath}: expected a JSON object`]);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const file = env.BRIDGE_CONFIG_FILE ? readConfigFile(env.BRIDGE_CONFIG_FILE) : {};

  return parseConfig({
    ...file,
    ...withoutUndefined({
      pollIntervalMs: toNumber(env.BRIDGE_POLL_INTERVAL_MS),
      readingPauseMs: toNumber(env.BRIDGE_READING_PAUSE_MS)
    }),
    logging: {
      ...asRecord(file.logging),
      ...withoutUndefined({
        level: env.LOG_LEVEL,
        format: env.LOG_FORMAT,
        logDir: env.LOG_DIR
      })
    },
    mqtt: {
      ...asRecord(file.mqtt),
      ...withoutUndefined({
        brokerUrl: env.MQTT_BROKER_URL,
        topicPrefix: env.MQTT_TOPIC_PREFIX
      })
    }
  });
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}
