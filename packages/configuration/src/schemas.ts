/**
 * Configuration schemas for the tetherfs configuration file
 */

import { z } from 'zod';

export const LoggingConfigSchema = z.object({
  level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT']).default('WARN'),
  format: z.enum(['json', 'text']).default('text'),
  /** Log file path (optional for console-only logging) */
  file: z.string().min(1).optional(),
  /** Maximum log file size before rotation */
  max_size: z
    .string()
    .regex(/^\d+(?:\.\d+)?\s*[KMG]?B$/i)
    .default('50MB'),
  backup_count: z.number().int().min(0).default(5),
});

/**
 * Where device-sync paths go. A mounted device is exposed by the host as a
 * directory; the memory transport keeps everything in process.
 */
export const DeviceConfigSchema = z.discriminatedUnion('transport', [
  z.object({
    transport: z.literal('mounted'),
    mount_path: z.string().min(1),
  }),
  z.object({
    transport: z.literal('memory'),
  }),
]);

export const LocalConfigSchema = z.object({
  /** Directory relative local paths resolve against (defaults to the process cwd) */
  base_directory: z.string().min(1).optional(),
});

export const TetherConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  /** Without a device section device-sync paths have no backend */
  device: DeviceConfigSchema.optional(),
  local: LocalConfigSchema.default({}),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type DeviceConfig = z.infer<typeof DeviceConfigSchema>;
export type LocalConfig = z.infer<typeof LocalConfigSchema>;
export type TetherConfig = z.infer<typeof TetherConfigSchema>;
