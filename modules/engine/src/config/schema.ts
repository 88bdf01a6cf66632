/**
 * modules/engine/src/config/schema.ts
 *
 * @file Zod schemas of the JSON configuration file. Filters and actions are validated here in their JSON form and
 * turned into engine types by the loader.
 */
import type {Rectangle, WindowStateFlag} from '@common/core/window.js';
import type {AttributeValue, FilterAttribute} from '@common/filter/expression.js';
import {WINDOW_STATE_FLAGS} from '@common/core/window.js';
import {FILTER_ATTRIBUTES} from '@common/filter/expression.js';
import {LOG_LEVELS} from '@common/logging.js';
import {z} from 'zod';

// ============================================================================
// Filters
// ============================================================================

export type FilterJson =
  | 'active'
  | 'currentDesktop'
  | 'always'
  | {and: FilterJson[]}
  | {or: FilterJson[]}
  | {not: FilterJson}
  | {equals: {attribute: FilterAttribute; value: AttributeValue}}
  | {inSet: {attribute: FilterAttribute; values: AttributeValue[]}}
  | {hasState: WindowStateFlag}
  | {containsPoint: {x: number; y: number}}
  | {intersects: Rectangle}
  | {preset: string};

export const RectangleSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
}).strict();

const AttributeSchema = z.enum(FILTER_ATTRIBUTES);
const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const StateFlagSchema = z.enum(WINDOW_STATE_FLAGS);

export const FilterJsonSchema: z.ZodType<FilterJson> = z.lazy(() => z.union([
  z.literal('active'),
  z.literal('currentDesktop'),
  z.literal('always'),
  z.object({and: z.array(FilterJsonSchema)}).strict(),
  z.object({or: z.array(FilterJsonSchema)}).strict(),
  z.object({not: FilterJsonSchema}).strict(),
  z.object({equals: z.object({attribute: AttributeSchema, value: AttributeValueSchema}).strict()}).strict(),
  z.object({inSet: z.object({attribute: AttributeSchema, values: z.array(AttributeValueSchema)}).strict()}).strict(),
  z.object({hasState: StateFlagSchema}).strict(),
  z.object({containsPoint: z.object({x: z.number(), y: z.number()}).strict()}).strict(),
  z.object({intersects: RectangleSchema}).strict(),
  z.object({preset: z.string().min(1)}).strict(),
]));

// ============================================================================
// Actions
// ============================================================================

/** A preset name or an inline filter. */
const TargetSchema = z.union([z.string().min(1), FilterJsonSchema]).optional();

const DirectionSchema = z.enum(['left', 'right', 'up', 'down']);
const UnitSchema = z.enum(['px', 'grid']).default('px');

const PERCENT = /^-?\d+(?:\.\d+)?%$/;

const PlacementOffsetSchema = z.union([
  z.number(),
  z.custom<`${number}%`>(value => typeof value === 'string' && PERCENT.test(value), {
    message: 'expected pixels or a percentage such as "25%"',
  }),
]);

export const GridSchema = z.object({
  columns: z.number().int().positive(),
  rows: z.number().int().positive(),
  gaps: z.number().min(0).default(0),
}).strict();

const CellSchema = z.union([
  z.object({
    col: z.number().int().min(0),
    row: z.number().int().min(0),
    colSpan: z.number().int().positive().optional(),
    rowSpan: z.number().int().positive().optional(),
  }).strict(),
  z.object({direction: DirectionSchema}).strict(),
]);

const PlacementSchema = z.object({
  horizontal: z.enum(['left', 'center', 'right']).optional(),
  vertical: z.enum(['top', 'center', 'bottom']).optional(),
  top: PlacementOffsetSchema.optional(),
  bottom: PlacementOffsetSchema.optional(),
  left: PlacementOffsetSchema.optional(),
  right: PlacementOffsetSchema.optional(),
  width: PlacementOffsetSchema.optional(),
  height: PlacementOffsetSchema.optional(),
}).strict();

export const ActionJsonSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('cycle'),
    direction: z.enum(['next', 'previous']).default('next'),
    target: TargetSchema,
  }).strict(),
  z.object({
    kind: z.literal('grid-put'),
    cell: CellSchema,
    grid: GridSchema.optional(),
    spanGrow: z.boolean().optional(),
    target: TargetSchema,
  }).strict(),
  z.object({
    kind: z.literal('move'),
    dx: z.number().default(0),
    dy: z.number().default(0),
    unit: UnitSchema,
    target: TargetSchema,
  }).strict(),
  z.object({
    kind: z.literal('resize'),
    edge: z.enum(['left', 'right', 'top', 'bottom', 'top-left', 'top-right', 'bottom-left', 'bottom-right']),
    delta: z.number(),
    unit: UnitSchema,
    target: TargetSchema,
  }).strict(),
  z.object({
    kind: z.literal('toggle-state'),
    flag: z.union([z.literal('maximized'), StateFlagSchema]),
    target: TargetSchema,
  }).strict(),
  z.object({
    kind: z.literal('place'),
    placement: PlacementSchema,
    target: TargetSchema,
  }).strict(),
]);

export type ActionJson = z.infer<typeof ActionJsonSchema>;

// ============================================================================
// Configuration file
// ============================================================================

export const ConfigSchema = z.object({
  grid: GridSchema.default({columns: 2, rows: 2, gaps: 0}),
  spanGrow: z.boolean().default(true),
  dispatch: z.object({
    awaitConfirmation: z.boolean().default(false),
    captureTimeoutMs: z.number().int().positive().default(2000),
  }).strict().default({}),
  x11: z.object({
    pollIntervalMs: z.number().int().positive().default(250),
    geometryDebounceMs: z.number().int().min(0).default(500),
    commandTimeoutMs: z.number().int().positive().default(1500),
  }).strict().default({}),
  logging: z.object({
    level: z.enum(LOG_LEVELS).default('INFO'),
    directory: z.string().min(1).optional(),
  }).strict().default({}),
  filters: z.record(z.string(), FilterJsonSchema).default({}),
  bindings: z.record(z.string(), ActionJsonSchema).default({}),
}).strict();

export type ConfigJson = z.infer<typeof ConfigSchema>;
