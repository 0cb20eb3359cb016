/**
 * Consistency checks over an emitted MCQ dataset. The validator only reports;
 * it never rewrites or drops records.
 */

import { z } from 'zod';

import { QUESTION_TYPES, type QuestionType } from '../questions/types.js';
import type { Tense } from '../questions/tense.js';
import { readJsonlLines, type JsonlLine } from './jsonl.js';

const QuestionTypeSchema = z.enum(QUESTION_TYPES);

const McqRecordSchema = z.object({
  video: z.string(),
  question: z.string(),
  options: z.array(z.string()).min(1),
  ground_truth: z.array(z.number().int()),
  metadata: z
    .object({
      question_type: QuestionTypeSchema,
      question_index_within_shot: z.number().int().optional(),
    })
    .passthrough(),
});

export interface ValidationReport {
  total: number;
  countsByType: Partial<Record<QuestionType, number>>;
  optionCountHistogram: Record<number, number>;
  correctCountHistogram: Record<number, number>;
  issues: string[];
}

const EXPECTED_TENSE: Record<QuestionType, Tense> = {
  descriptive: 'base',
  predictive: 'future',
  counterfactual_velocity: 'conditional',
  counterfactual_position: 'conditional',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isQuestionType(value: unknown): value is QuestionType {
  return QUESTION_TYPES.some((type) => type === value);
}

export function detectTense(option: string): Tense {
  if (/\bwill\b/.test(option)) return 'future';
  if (/\bwould\b/.test(option)) return 'conditional';
  return 'base';
}

export function validateRecordSchema(value: unknown, line: number): string[] {
  const issues: string[] = [];
  const parsed = McqRecordSchema.safeParse(value);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'record';
      issues.push(`line ${line}: ${field}: ${issue.message}`);
    }
  }

  if (!isRecord(value)) return issues;
  const options = value.options;
  const groundTruth = value.ground_truth;
  if (!Array.isArray(options) || options.length === 0 || !Array.isArray(groundTruth)) {
    return issues;
  }

  if (new Set(options).size !== options.length) {
    issues.push(`line ${line}: duplicate option strings within the same question`);
  }

  const seen = new Set<number>();
  for (const idx of groundTruth) {
    if (typeof idx !== 'number' || !Number.isInteger(idx)) continue;
    if (idx < 0 || idx >= options.length) {
      issues.push(`line ${line}: ground_truth index ${idx} out of bounds for ${options.length} options`);
    }
    if (seen.has(idx)) {
      issues.push(`line ${line}: duplicate ground_truth index ${idx} within the same example`);
    }
    seen.add(idx);
  }
  return issues;
}

/**
 * Option phrasing must match the question type: descriptive options never use
 * "will"/"would", predictive ones never "would", counterfactual ones never
 * "will". Predictive and counterfactual questions need at least one option in
 * their own tense.
 */
export function validateTenseConsistency(value: unknown, line: number): string[] {
  if (!isRecord(value) || !isRecord(value.metadata)) return [];
  const questionType = value.metadata.question_type;
  if (!isQuestionType(questionType)) return [];

  const options = Array.isArray(value.options)
    ? value.options.filter((opt): opt is string => typeof opt === 'string')
    : [];
  const expected = EXPECTED_TENSE[questionType];
  const issues: string[] = [];

  options.forEach((option, i) => {
    const tense = detectTense(option);
    if (expected === 'base' && tense !== 'base') {
      issues.push(
        `line ${line}: option[${i}] has tense '${tense}' but expected base for question_type '${questionType}'`
      );
    } else if (expected === 'future' && tense === 'conditional') {
      issues.push(`line ${line}: option[${i}] uses conditional 'would' but question_type is 'predictive'`);
    } else if (expected === 'conditional' && tense === 'future') {
      issues.push(`line ${line}: option[${i}] uses 'will' but question_type is '${questionType}'`);
    }
  });

  if (options.length > 0) {
    const tenses = new Set(options.map(detectTense));
    if (expected === 'future' && !tenses.has('future')) {
      issues.push(`line ${line}: predictive question has no 'will' options`);
    }
    if (expected === 'conditional' && !tenses.has('conditional')) {
      issues.push(`line ${line}: counterfactual question has no 'would' options`);
    }
  }
  return issues;
}

/**
 * `question_index_within_shot` must run 0..k-1 within each (sim_id, question_type).
 */
export function validateQuestionIndices(groups: ReadonlyMap<string, readonly number[]>): string[] {
  const issues: string[] = [];
  for (const [group, indices] of groups) {
    if (indices.length === 0) continue;
    const unique = [...new Set(indices)].sort((a, b) => a - b);
    const dense = unique.every((value, i) => value === i);
    if (!dense) {
      const expected = unique.map((_, i) => i);
      issues.push(
        `${group}: question_index_within_shot values [${unique.join(', ')}] not equal to [${expected.join(', ')}]`
      );
    }
  }
  return issues;
}

function bump(histogram: Record<number, number>, key: number): void {
  histogram[key] = (histogram[key] ?? 0) + 1;
}

export function validateQaLines(lines: readonly JsonlLine[], maxIssues = 1000): ValidationReport {
  const report: ValidationReport = {
    total: 0,
    countsByType: {},
    optionCountHistogram: {},
    correctCountHistogram: {},
    issues: [],
  };
  const groups = new Map<string, number[]>();
  const full = (): boolean => report.issues.length >= maxIssues;

  for (const { line, text } of lines) {
    report.total += 1;

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      report.issues.push(`line ${line}: JSON decode error: ${message}`);
      if (full()) break;
      continue;
    }

    report.issues.push(...validateRecordSchema(value, line));
    if (full()) break;

    const record: Record<string, unknown> = isRecord(value) ? value : {};
    const options = Array.isArray(record.options) ? record.options : [];
    const groundTruth = Array.isArray(record.ground_truth) ? record.ground_truth : [];
    const metadata: Record<string, unknown> = isRecord(record.metadata) ? record.metadata : {};
    const questionType = metadata.question_type;

    if (isQuestionType(questionType)) {
      report.countsByType[questionType] = (report.countsByType[questionType] ?? 0) + 1;
    }
    bump(report.optionCountHistogram, options.length);
    bump(report.correctCountHistogram, groundTruth.filter((idx) => Number.isInteger(idx)).length);

    report.issues.push(...validateTenseConsistency(value, line));
    if (full()) break;

    const simId = metadata.sim_id;
    const questionIndex = metadata.question_index_within_shot;
    const grouped =
      simId !== undefined && simId !== null && typeof questionType === 'string';
    if (grouped && questionIndex !== undefined && questionIndex !== null) {
      if (typeof questionIndex === 'number' && Number.isInteger(questionIndex)) {
        const key = `sim_id=${String(simId)}, question_type='${questionType}'`;
        const bucket = groups.get(key) ?? [];
        bucket.push(questionIndex);
        groups.set(key, bucket);
      } else {
        report.issues.push(
          `line ${line}: question_index_within_shot is not an int (value=${JSON.stringify(questionIndex)})`
        );
        if (full()) break;
      }
    }
  }

  report.issues.push(...validateQuestionIndices(groups));
  report.issues = report.issues.slice(0, maxIssues);
  return report;
}

export function validateQaFile(path: string, maxIssues = 1000): ValidationReport {
  return validateQaLines(readJsonlLines(path), maxIssues);
}

export function formatValidationReport(report: ValidationReport, source: string): string {
  const lines = [
    `Validated ${report.total} examples from ${source}`,
    `Counts by question_type: ${JSON.stringify(report.countsByType)}`,
    `Histogram of number of options per question: ${JSON.stringify(report.optionCountHistogram)}`,
    `Histogram of number of correct options per question: ${JSON.stringify(report.correctCountHistogram)}`,
  ];
  if (report.issues.length === 0) {
    lines.push('', 'No issues found.');
  } else {
    lines.push('', `Found ${report.issues.length} issue(s):`);
    for (const issue of report.issues) {
      lines.push(` - ${issue}`);
    }
  }
  return lines.join('\n');
}
