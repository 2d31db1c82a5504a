import type { ReActStep } from '../../../shared/types.js';
import { errorMessage } from '../utils/logger.js';

export type JsonExtraction =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; error: string; raw: string };

export interface ParsedReactResponse {
  thought: string;
  action: string;
  actionInput: Record<string, unknown>;
  parseError?: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stripCodeFence(text: string): string {
  let cleaned = text.trim();
  if (!cleaned.startsWith('```')) {
    return cleaned;
  }
  const firstNewline = cleaned.indexOf('\n');
  cleaned = firstNewline === -1 ? '' : cleaned.slice(firstNewline + 1);
  cleaned = cleaned.trimEnd();
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

function jsonTypeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Parses a model reply expected to hold one JSON object. Non-object JSON is
 * wrapped as `{ value, raw_type }`.
 */
export function extractJsonObject(text: string): JsonExtraction {
  const cleaned = stripCodeFence(text);
  try {
    const parsed: unknown = JSON.parse(cleaned);
    if (isRecord(parsed)) {
      return { ok: true, value: parsed };
    }
    return { ok: true, value: { value: parsed, raw_type: jsonTypeName(parsed) } };
  } catch (error) {
    return { ok: false, error: errorMessage(error), raw: text.slice(0, 500) };
  }
}

type Label = 'thought' | 'action' | 'action input' | 'observation';

const LABEL_PATTERN = /^\s*(thought|action\s+input|action|observation)\s*:\s?(.*)$/i;

function normalizeLabel(raw: string): Label {
  const lower = raw.toLowerCase().replace(/\s+/g, ' ');
  if (lower === 'thought' || lower === 'action' || lower === 'action input') {
    return lower;
  }
  return 'observation';
}

function cleanActionName(raw: string): string {
  const firstLine = raw.trim().split('\n')[0] ?? '';
  return firstLine.trim().replace(/^[`'"*]+|[`'"*]+$/g, '').trim();
}

function parseActionInput(raw: string | undefined): { value: Record<string, unknown>; error?: string } {
  if (raw === undefined) {
    return { value: { raw: '' }, error: 'Missing Action Input' };
  }

  const cleaned = stripCodeFence(raw);
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start === -1 || end < start) {
    return { value: { raw: cleaned }, error: 'Action Input is not a JSON object' };
  }

  try {
    const parsed: unknown = JSON.parse(cleaned.slice(start, end + 1));
    if (isRecord(parsed)) {
      return { value: parsed };
    }
    return { value: { raw: cleaned }, error: 'Action Input is not a JSON object' };
  } catch (error) {
    return { value: { raw: cleaned }, error: `Invalid Action Input JSON: ${errorMessage(error)}` };
  }
}

function fromJsonReply(value: Record<string, unknown>): ParsedReactResponse {
  const errors: string[] = [];
  const thought = typeof value.thought === 'string' ? value.thought.trim() : '';
  const action = typeof value.action === 'string' ? cleanActionName(value.action) : '';
  if (!action) {
    errors.push('Missing Action');
  }

  const rawInput = value.action_input ?? value.actionInput;
  let actionInput: Record<string, unknown> = {};
  if (isRecord(rawInput)) {
    actionInput = rawInput;
  } else if (typeof rawInput === 'string') {
    const parsed = parseActionInput(rawInput);
    actionInput = parsed.value;
    if (parsed.error) errors.push(parsed.error);
  } else if (rawInput !== undefined && rawInput !== null) {
    actionInput = { raw: String(rawInput) };
    errors.push('Action Input is not a JSON object');
  }

  return errors.length ? { thought, action, actionInput, parseError: errors.join('; ') } : { thought, action, actionInput };
}

/**
 * Reads one reasoning step in the Thought / Action / Action Input format,
 * or the equivalent JSON object. Parsing stops at the first Observation or
 * repeated label so a model that runs ahead is cut off. Never throws.
 */
export function parseReactResponse(text: string): ParsedReactResponse {
  const trimmed = stripCodeFence(text);

  if (trimmed.startsWith('{')) {
    const extracted = extractJsonObject(trimmed);
    if (extracted.ok && ('action' in extracted.value || 'thought' in extracted.value)) {
      return fromJsonReply(extracted.value);
    }
  }

  const sections = new Map<Label, string[]>();
  let current: Label | null = null;
  const preamble: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    const match = LABEL_PATTERN.exec(line);
    if (match) {
      const label = normalizeLabel(match[1] ?? '');
      if (label === 'observation' || sections.has(label)) {
        break;
      }
      current = label;
      sections.set(label, [match[2] ?? '']);
      continue;
    }
    if (current) {
      sections.get(current)?.push(line);
    } else {
      preamble.push(line);
    }
  }

  const section = (label: Label) => sections.get(label)?.join('\n').trim();
  const errors: string[] = [];

  const thought = section('thought') ?? preamble.join('\n').trim();
  const action = cleanActionName(section('action') ?? '');
  if (!action) {
    errors.push('Missing Action');
  }

  const input = parseActionInput(section('action input'));
  if (input.error) {
    errors.push(input.error);
  }

  const parsed: ParsedReactResponse = { thought, action, actionInput: input.value };
  if (errors.length) {
    parsed.parseError = errors.join('; ');
  }
  return parsed;
}

export function isFinishAction(action: string): boolean {
  return action.trim().toLowerCase() === 'finish';
}

export function formatReactScratchpad(steps: readonly ReActStep[]): string {
  return steps
    .map((step) =>
      [
        `Thought: ${step.thought}`,
        `Action: ${step.action}`,
        `Action Input: ${JSON.stringify(step.actionInput)}`,
        `Observation: ${step.observation}`
      ].join('\n')
    )
    .join('\n\n');
}
