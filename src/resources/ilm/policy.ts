/**
 * ILM policy schema plus the expand/flatten pair between the declared phase
 * tree and the `{"phases": {...}, "_meta": {...}}` policy document.
 *
 * @module
 */
import { z } from 'zod';
import { ValidationError } from '../../lib/errors.js';
import type { LifecyclePolicy, PhaseDocument, PolicyDocument } from '../../lib/esClient.js';
import { encodeJsonAttribute, parseJsonObject } from '../../lib/jsonUtils.js';
import { connectionBlock } from '../connection.js';
import { block, jsonString } from '../schemaUtils.js';
import {
  ACTION_SCHEMAS,
  TOGGLE_ACTIONS,
  expandAction,
  flattenAction,
  isActionName,
  type ActionDocument,
  type ActionName,
  type PhaseActions,
} from './actions.js';

export const PHASE_NAMES = ['hot', 'warm', 'cold', 'frozen', 'delete'] as const;
export type PhaseName = (typeof PHASE_NAMES)[number];

/** Actions each phase accepts. */
export const PHASE_ACTIONS: Readonly<Record<PhaseName, readonly ActionName[]>> = Object.freeze({
  hot: ['set_priority', 'unfollow', 'rollover', 'readonly', 'shrink', 'forcemerge', 'searchable_snapshot'],
  warm: ['set_priority', 'unfollow', 'readonly', 'allocate', 'migrate', 'shrink', 'forcemerge'],
  cold: ['set_priority', 'unfollow', 'readonly', 'searchable_snapshot', 'allocate', 'migrate', 'freeze'],
  frozen: ['searchable_snapshot'],
  delete: ['wait_for_snapshot', 'delete'],
});

export type PhaseConfig = PhaseActions & { min_age?: string };

function unsupportedAction(phase: PhaseName, action: string): ValidationError {
  return new ValidationError(
    'Unknown action defined.',
    isActionName(action)
      ? `Configured action "${action}" is not supported in the ${phase} phase`
      : `Configured action "${action}" is not supported`,
  );
}

/**
 * Schema of one phase. Keys outside the phase's action set are reported by
 * name before the typed shape is applied.
 */
function phaseSchema<S extends z.ZodRawShape>(phase: PhaseName, actions: S) {
  return z
    .record(z.unknown())
    .superRefine((value, ctx) => {
      for (const key of Object.keys(value)) {
        if (key === 'min_age' || key in actions) continue;
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: unsupportedAction(phase, key).detail });
      }
    })
    .pipe(z.object({ min_age: z.string().optional(), ...actions }));
}

const a = ACTION_SCHEMAS;

const hotPhase = phaseSchema('hot', {
  set_priority: block(a.set_priority),
  unfollow: block(a.unfollow),
  rollover: block(a.rollover),
  readonly: block(a.readonly),
  shrink: block(a.shrink),
  forcemerge: block(a.forcemerge),
  searchable_snapshot: block(a.searchable_snapshot),
});

const warmPhase = phaseSchema('warm', {
  set_priority: block(a.set_priority),
  unfollow: block(a.unfollow),
  readonly: block(a.readonly),
  allocate: block(a.allocate),
  migrate: block(a.migrate),
  shrink: block(a.shrink),
  forcemerge: block(a.forcemerge),
});

const coldPhase = phaseSchema('cold', {
  set_priority: block(a.set_priority),
  unfollow: block(a.unfollow),
  readonly: block(a.readonly),
  searchable_snapshot: block(a.searchable_snapshot),
  allocate: block(a.allocate),
  migrate: block(a.migrate),
  freeze: block(a.freeze),
});

const frozenPhase = phaseSchema('frozen', {
  searchable_snapshot: block(a.searchable_snapshot),
});

const deletePhase = phaseSchema('delete', {
  wait_for_snapshot: block(a.wait_for_snapshot),
  delete: block(a.delete),
});

export const ilmPolicySchema = z
  .object({
    /** Identifier of the policy; changing it replaces the policy. */
    name: z.string().min(1),
    metadata: jsonString.optional(),
    hot: block(hotPhase),
    warm: block(warmPhase),
    cold: block(coldPhase),
    frozen: block(frozenPhase),
    delete: block(deletePhase),
    modified_date: z.string().optional(),
    elasticsearch_connection: connectionBlock,
  })
  .strict()
  .superRefine((policy, ctx) => {
    if (PHASE_NAMES.every((phase) => policy[phase] === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `at least one of ${PHASE_NAMES.join(', ')} must be specified`,
      });
    }
  });

export type IlmPolicyConfig = z.infer<typeof ilmPolicySchema>;

// ---------------------------------------------------------------------------
// Expand
// ---------------------------------------------------------------------------

/**
 * Builds the request document of one phase.
 *
 * @throws {ValidationError} For an action outside the phase's legal set; the
 *   whole policy is rejected, not just the action.
 */
export function expandPhase(phaseName: PhaseName, phase: PhaseConfig): PhaseDocument {
  const actions: Record<string, ActionDocument> = {};
  for (const key of Object.keys(phase)) {
    if (key === 'min_age') continue;
    if (!isActionName(key) || !PHASE_ACTIONS[phaseName].includes(key)) {
      throw unsupportedAction(phaseName, key);
    }
    const doc = expandAction(key, phase, `${phaseName}.${key}`);
    if (doc) actions[key] = doc;
  }

  const out: PhaseDocument = { actions };
  if (phase.min_age) out.min_age = phase.min_age;
  return out;
}

export function expandPolicy(config: IlmPolicyConfig): PolicyDocument {
  const phases: Record<string, PhaseDocument> = {};
  for (const phaseName of PHASE_NAMES) {
    const phase = config[phaseName];
    if (phase) phases[phaseName] = expandPhase(phaseName, phase);
  }

  const policy: PolicyDocument = { phases };
  if (config.metadata) policy._meta = parseJsonObject('metadata', config.metadata);
  return policy;
}

// ---------------------------------------------------------------------------
// Flatten
// ---------------------------------------------------------------------------

export type UnsupportedActionHandler = (phase: PhaseName, action: string) => void;

/**
 * Rebuilds the declared form of a phase from the cluster's document.
 *
 * The cluster drops a disabled toggle action from the policy, so its absence
 * alone cannot tell "never declared" from "declared with enabled = false".
 * Every toggle the declared phase contains therefore starts out as
 * `{enabled: false}` and is switched to `{enabled: true}` only if the cluster
 * document has it. Toggles that were never declared stay unset.
 *
 * @param declared - The phase as currently declared, if any.
 * @param onUnsupported - Called for cluster actions outside the phase's known set; those are skipped.
 */
export function flattenPhase(
  phaseName: PhaseName,
  doc: PhaseDocument,
  declared: PhaseConfig | undefined,
  onUnsupported?: UnsupportedActionHandler,
): PhaseConfig {
  const legal = PHASE_ACTIONS[phaseName];
  const out: PhaseConfig = {};

  for (const toggle of TOGGLE_ACTIONS) {
    if (legal.includes(toggle) && declared?.[toggle] !== undefined) {
      out[toggle] = { enabled: false };
    }
  }

  if (doc.min_age) out.min_age = doc.min_age;

  for (const [name, settings] of Object.entries(doc.actions)) {
    if (!isActionName(name) || !legal.includes(name)) {
      onUnsupported?.(phaseName, name);
      continue;
    }
    flattenAction(name, settings, declared, out);
  }
  return out;
}

/**
 * Rebuilds the declared form of a whole policy.
 *
 * JSON metadata keeps the declared text when it is equivalent to the
 * cluster's; the connection block is carried over from the declaration.
 */
export function flattenPolicy(
  name: string,
  entry: LifecyclePolicy,
  declared: IlmPolicyConfig | undefined,
  onUnsupported?: UnsupportedActionHandler,
): IlmPolicyConfig {
  const { phases, _meta } = entry.policy;
  const flatten = (phaseName: PhaseName, current: PhaseConfig | undefined): PhaseConfig | undefined => {
    const doc = phases[phaseName];
    return doc ? flattenPhase(phaseName, doc, current, onUnsupported) : undefined;
  };

  return {
    name,
    metadata: _meta !== undefined ? encodeJsonAttribute(_meta, declared?.metadata) : undefined,
    hot: flatten('hot', declared?.hot),
    warm: flatten('warm', declared?.warm),
    cold: flatten('cold', declared?.cold),
    frozen: flatten('frozen', declared?.frozen),
    delete: flatten('delete', declared?.delete),
    modified_date: entry.modified_date,
    elasticsearch_connection: declared?.elasticsearch_connection,
  };
}
