/**
 * @file Shell Protocol Schemas
 *
 * Zod runtime schemas for every frame that crosses the bridge boundary
 * (compositor → client). Nothing reaches the state machine before it has
 * passed `ShellEventSchema.safeParse`.
 *
 * Usage:
 *   const result = ShellEventSchema.safeParse(JSON.parse(raw));
 *   if (!result.success) { ... answer with an error frame ... }
 *   machine.event_dispatch(result.data);
 *
 * @module shell/protocol/schemas
 */

import { z } from 'zod';

// ─── Shared ──────────────────────────────────────────────────────────────────

const GlobalIdSchema = z.number().int().nonnegative();
const SurfaceIdSchema = z.number().int().nonnegative();
const DimensionSchema = z.number().int().nonnegative();

// ─── Individual event schemas ────────────────────────────────────────────────

export const GlobalAddedSchema = z.object({
    type:      z.literal('global-added'),
    interface: z.string().min(1),
    id:        GlobalIdSchema,
    version:   z.number().int().positive()
});

export const GlobalRemovedSchema = z.object({
    type:      z.literal('global-removed'),
    interface: z.string().min(1),
    id:        GlobalIdSchema
});

export const ConfigureSchema = z.object({
    type:    z.literal('configure'),
    surface: SurfaceIdSchema,
    edges:   z.number().int().nonnegative(),
    width:   DimensionSchema,
    height:  DimensionSchema
});

export const PrepareLockSchema = z.object({
    type: z.literal('prepare-lock')
});

export const GrabCursorSchema = z.object({
    type:   z.literal('grab-cursor'),
    cursor: z.number().int().nonnegative()
});

export const UserSwitchedSchema = z.object({
    type:     z.literal('user-switched'),
    username: z.string().min(1)
});

export const OutputGeometrySchema = z.object({
    type:      z.literal('output-geometry'),
    output:    GlobalIdSchema,
    transform: z.number().int().min(0).max(7)
});

export const OutputScaleSchema = z.object({
    type:   z.literal('output-scale'),
    output: GlobalIdSchema,
    scale:  z.number().int().positive()
});

// ─── Union ───────────────────────────────────────────────────────────────────

/**
 * Discriminated union of all compositor events.
 */
export const ShellEventSchema = z.discriminatedUnion('type', [
    GlobalAddedSchema,
    GlobalRemovedSchema,
    ConfigureSchema,
    PrepareLockSchema,
    GrabCursorSchema,
    UserSwitchedSchema,
    OutputGeometrySchema,
    OutputScaleSchema
]);

export type ValidatedShellEvent = z.infer<typeof ShellEventSchema>;
