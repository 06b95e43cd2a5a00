/**
 * @file Shell Config Schemas
 *
 * Zod runtime schemas for the YAML config file.
 *
 * The schema is deliberately permissive: wrong values inside a section are
 * the settings service's business (it logs and falls back to a default), so
 * a bad `background-type` or a launcher without a `path` never rejects the
 * whole file. Only a structurally broken document does.
 *
 * @module config/schemas
 */

import { z } from 'zod';

/** Colours are ARGB words, written as YAML ints or as "0x..." strings. */
export const ColorSchema = z.union([z.number(), z.string()]);

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

// ─── [shell] ─────────────────────────────────────────────────────────────────

/**
 * Known keys are typed; per-user keys such as `background-image-alice`
 * pass through the catchall.
 */
export const ShellSectionSchema = z.object({
    'locking':          z.boolean().optional(),
    'panel-color':      ColorSchema.optional(),
    'background-image': z.string().optional(),
    'background-color': ColorSchema.optional(),
    'background-type':  z.string().optional(),
    'data-dir':         z.string().optional()
}).catchall(ScalarSchema);

// ─── [launcher] / [launcher-<user>] ──────────────────────────────────────────

export const LauncherSectionSchema = z.object({
    icon: z.string().optional(),
    path: z.string().optional(),
    /** Restricts the launcher to one user's panel. */
    user: z.string().min(1).optional()
});

// ─── Document ────────────────────────────────────────────────────────────────

export const ShellConfigSchema = z.object({
    shell:     ShellSectionSchema.default({}),
    launchers: z.array(LauncherSectionSchema).default([])
});

export type ShellConfig = z.infer<typeof ShellConfigSchema>;
export type ShellSection = z.infer<typeof ShellSectionSchema>;
export type LauncherSection = z.infer<typeof LauncherSectionSchema>;

/** Config used when no file is present. */
export const EMPTY_CONFIG: ShellConfig = { shell: {}, launchers: [] };
