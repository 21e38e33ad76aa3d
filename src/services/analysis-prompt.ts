/**
 * Analysis request assembly and response contract.
 *
 * The request gathers everything the reasoning service needs to judge one
 * control; the response schema is the only shape accepted back.
 */

import { z } from 'zod';
import type { ReasoningRequest } from '../providers/IReasoningProvider.js';
import type {
  AssessmentMethod,
  ControlRequirement,
  EvidenceRef,
  InheritanceRecord,
} from '../types/models.js';
import { MalformedResponseError } from '../errors.js';

/** Tolerance on the evidence weight budget of 100. */
export const WEIGHT_TOLERANCE = 1;

export interface AnalysisRequest {
  controlId: string;
  title: string;
  family: string;
  requirement: string;
  objectives: Array<{ id: string; text: string; method: AssessmentMethod | null }>;
  methods: AssessmentMethod[];
  evidence: Array<{ id: string; title: string; type: string; description: string | null }>;
  /** Rendered excerpts; empty when nothing was retrieved. */
  context: string;
  sharedResponsibilities: Array<{ provider: string; narrative: string | null }>;
}

export const analysisResponseSchema = z.object({
  determination: z.enum(['Met', 'Not Met', 'Partially Met', 'Not Applicable']),
  confidence: z.number().min(0).max(100),
  narrative: z.string().min(1),
  evidence_analysis: z
    .record(
      z.object({
        contribution: z.string(),
        weight: z.number().min(0).max(100),
      })
    )
    .default({}),
  gaps_identified: z.array(z.string()).default([]),
  recommendations: z.array(z.string()).default([]),
});

export type AnalysisResponse = z.infer<typeof analysisResponseSchema>;

/** Methods named by the control's objectives; examine when none are. */
export function controlMethods(control: ControlRequirement): AssessmentMethod[] {
  const methods: AssessmentMethod[] = [];
  for (const objective of control.objectives) {
    if (objective.method && !methods.includes(objective.method)) {
      methods.push(objective.method);
    }
  }
  return methods.length > 0 ? methods : ['examine'];
}

export function buildAnalysisRequest(
  control: ControlRequirement,
  evidence: EvidenceRef[],
  context: string,
  inheritance: InheritanceRecord[]
): AnalysisRequest {
  return {
    controlId: control.id,
    title: control.title,
    family: control.family,
    requirement: control.requirement,
    objectives: control.objectives.map((o) => ({ id: o.id, text: o.text, method: o.method })),
    methods: controlMethods(control),
    evidence: evidence.map((e) => ({
      id: e.id,
      title: e.title,
      type: e.type,
      description: e.description,
    })),
    context,
    sharedResponsibilities: inheritance
      .filter((r) => r.responsibility === 'Shared')
      .map((r) => ({ provider: r.provider, narrative: r.narrative })),
  };
}

const SYSTEM_INSTRUCTION = [
  'You are a compliance assessor evaluating whether an organization satisfies a security control.',
  'Judge only from the evidence and excerpts provided. Do not assume controls are implemented.',
  'Respond with a single JSON object and nothing else, with these fields:',
  '  "determination": one of "Met", "Not Met", "Partially Met", "Not Applicable"',
  '  "confidence": integer 0-100',
  '  "narrative": assessor narrative citing the evidence',
  '  "evidence_analysis": object keyed by evidence id, each {"contribution": string, "weight": number}; weights sum to at most 100',
  '  "gaps_identified": array of strings',
  '  "recommendations": array of strings',
].join('\n');

export function renderPrompt(request: AnalysisRequest): ReasoningRequest {
  const lines: string[] = [
    `Control: ${request.controlId} - ${request.title} (${request.family})`,
    `Assessment methods: ${request.methods.join(', ')}`,
    '',
    'Requirement:',
    request.requirement,
  ];

  if (request.objectives.length > 0) {
    lines.push('', 'Assessment objectives:');
    for (const o of request.objectives) {
      lines.push(`- [${o.id}]${o.method ? ` (${o.method})` : ''} ${o.text}`);
    }
  }

  lines.push('', 'Evidence items:');
  if (request.evidence.length === 0) {
    lines.push('None provided.');
  } else {
    for (const e of request.evidence) {
      lines.push(`- id=${e.id} type=${e.type} title="${e.title}"${e.description ? `: ${e.description}` : ''}`);
    }
  }

  if (request.sharedResponsibilities.length > 0) {
    lines.push('', 'Shared responsibility with infrastructure providers:');
    for (const s of request.sharedResponsibilities) {
      lines.push(`- ${s.provider}${s.narrative ? `: ${s.narrative}` : ''}`);
    }
  }

  lines.push('', 'Relevant document excerpts:', request.context || 'None retrieved.');

  return { system: SYSTEM_INSTRUCTION, prompt: lines.join('\n') };
}

/** The same request with a stricter reminder of the output contract. */
export function withRepairReminder(request: ReasoningRequest, problem: string): ReasoningRequest {
  return {
    system: request.system,
    prompt:
      `${request.prompt}\n\n` +
      `Your previous reply could not be used (${problem}). ` +
      'Reply again with only the JSON object described in the instructions. ' +
      'Use evidence ids exactly as listed and keep the weights within 100 in total.',
  };
}

const FENCED = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/** Parse and validate a response. Throws MalformedResponseError. */
export function parseAnalysisResponse(text: string): AnalysisResponse {
  const trimmed = text.trim();
  const body = FENCED.exec(trimmed)?.[1] ?? trimmed;

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    throw new MalformedResponseError('response is not valid JSON');
  }

  const parsed = analysisResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedResponseError(
      `${issue.path.join('.') || 'response'}: ${issue.message}`,
      { issues: parsed.error.issues.length }
    );
  }

  const totalWeight = Object.values(parsed.data.evidence_analysis).reduce(
    (sum, e) => sum + e.weight,
    0
  );
  if (totalWeight > 100 + WEIGHT_TOLERANCE) {
    throw new MalformedResponseError(`evidence weights sum to ${totalWeight}`, {
      totalWeight,
    });
  }

  return parsed.data;
}
