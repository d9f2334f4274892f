/**
 * @fileoverview Import command - Load a mechanism graph from a JSON file
 *
 * The file is validated as a whole before anything is written. Writes go
 * through the store in dependency order (framework entities, nodes, edges,
 * spans), so anchor and polarity rules are enforced by the store itself.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { safeJsonParse } from '../../core/result.js';
import { logInfo } from '../../telemetry/logger.js';
import type { StoreWriteResult, WorldModelStore } from '../../storage/types.js';
import { parseRelationType } from '../../world_model/polarity.js';
import { FRAMEWORK_REF_KINDS, REF_KINDS } from '../../world_model/types.js';
import type { EvidenceSpan, RelationType } from '../../world_model/types.js';
import { createError } from '../errors.js';
import { GLOBAL_OPTIONS, parseOrUsage, printJson, withEngine } from '../session.js';
import type { CommandOptions } from '../session.js';

// ============================================================================
// SCHEMA
// ============================================================================

const Id = z.string().trim().min(1);

const FrameworkEntitySchema = z.object({
  kind: z.enum(FRAMEWORK_REF_KINDS),
  id: Id,
  label: z.string().trim().min(1),
  parentId: Id.nullable().optional(),
});

const NodeSchema = z.object({
  id: Id,
  refKind: z.enum(REF_KINDS),
  refId: Id,
  label: z.string().trim().min(1),
  sourceId: z.string().nullable().optional(),
});

const SpanFields = z.object({
  chunkId: Id,
  spanStart: z.number().int().min(0),
  spanEnd: z.number().int().min(0),
  quote: z.string().trim().min(1),
});

const spanOrder = {
  check: (span: { spanStart: number; spanEnd: number }) => span.spanEnd >= span.spanStart,
  params: { message: 'spanEnd must not precede spanStart', path: ['spanEnd'] },
};

const EdgeSpanSchema = SpanFields.refine(spanOrder.check, spanOrder.params);

const SpanSchema = SpanFields.extend({ edgeId: Id }).refine(spanOrder.check, spanOrder.params);

const RelationTypeSchema = z.string().transform((value, ctx): RelationType => {
  const relation = parseRelationType(value);
  if (relation === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown relation type "${value}"` });
    return z.NEVER;
  }
  return relation;
});

const EdgeSchema = z.object({
  id: Id,
  fromNode: Id,
  toNode: Id,
  relationType: RelationTypeSchema,
  polarity: z.union([z.literal(1), z.literal(-1)]).optional(),
  polarityOverridden: z.boolean().optional(),
  confidence: z.number().min(0).max(1).optional(),
  spans: z.array(EdgeSpanSchema).optional(),
});

export const GraphImportSchema = z.object({
  frameworkEntities: z.array(FrameworkEntitySchema).default([]),
  nodes: z.array(NodeSchema).default([]),
  edges: z.array(EdgeSchema).default([]),
  spans: z.array(SpanSchema).default([]),
});

export type GraphImport = z.infer<typeof GraphImportSchema>;

export interface GraphImportReport {
  frameworkEntities: StoreWriteResult;
  nodes: StoreWriteResult;
  edges: StoreWriteResult;
  spans: StoreWriteResult;
}

// ============================================================================
// IMPORT
// ============================================================================

/**
 * Validate raw JSON as a graph file.
 *
 * @throws CliError (IMPORT_INVALID) naming the first offending field
 */
export function parseGraphImport(raw: unknown): GraphImport {
  const parsed = GraphImportSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : 'graph';
    throw createError('IMPORT_INVALID', `${field}: ${issue.message}`, { field });
  }
  return parsed.data;
}

/** Write a validated graph. Store validation errors propagate. */
export async function importGraph(store: WorldModelStore, graph: GraphImport): Promise<GraphImportReport> {
  const spans: EvidenceSpan[] = [
    ...graph.edges.flatMap((edge) => (edge.spans ?? []).map((span) => ({ ...span, edgeId: edge.id }))),
    ...graph.spans,
  ];

  const frameworkEntities = await store.upsertFrameworkEntities(graph.frameworkEntities);
  const nodes = await store.upsertNodes(graph.nodes);
  const edges = await store.upsertEdges(graph.edges.map(({ spans: _spans, ...edge }) => edge));
  const spanResult = await store.insertSpans(spans);

  return { frameworkEntities, nodes, edges, spans: spanResult };
}

export async function importCommand(options: CommandOptions): Promise<void> {
  const { positionals } = parseOrUsage(() => parseArgs({
    args: options.args,
    options: { ...GLOBAL_OPTIONS },
    allowPositionals: true,
    strict: true,
  }));

  const file = positionals[0];
  if (!file) {
    throw createError('INVALID_ARGUMENT', 'Graph file is required. Usage: world-model import <graph.json>');
  }

  const filePath = path.resolve(options.workspace, file);
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw createError('FILE_NOT_FOUND', `Cannot read ${filePath}: ${message}`);
  }

  const json = safeJsonParse(content);
  if (!json.ok) {
    throw createError('IMPORT_INVALID', `${file} is not valid JSON: ${json.error.message}`);
  }
  const graph = parseGraphImport(json.value);

  const report = await withEngine(options.workspace, async (engine, store) => {
    const written = await importGraph(store, graph);
    await engine.invalidateOnEdgeInsert();
    return written;
  });

  logInfo('Imported mechanism graph', { file: filePath });
  printJson(report);
}
