/**
 * @fileoverview A/B Test Command
 *
 * Usage:
 *   docintel abtest create <name> [--split S] [--min-samples N] [--alpha A]
 *                                 [--control V] [--treatment V]
 *   docintel abtest assign <name> <userId>
 *   docintel abtest record <name> <variant> <userId> <outcome>
 *   docintel abtest analyze <name>
 *   docintel abtest list
 */

import type { ABTestAnalysis } from '../../evaluation/ab_testing.js';
import { createError, toCliError } from '../errors.js';
import {
  GLOBAL_OPTIONS,
  parseCommandArgs,
  parseIntegerFlag,
  parseNumberFlag,
  printJson,
  withService,
  type CommandOptions,
} from '../context.js';
import { printKeyValue, printTable } from '../progress.js';

const ACTIONS = ['create', 'assign', 'record', 'analyze', 'list'] as const;
type Action = (typeof ACTIONS)[number];

/** Positional arguments after the action */
const ARITY: Record<Action, number> = { create: 1, assign: 2, record: 4, analyze: 1, list: 0 };

function parseAction(raw: string | undefined): Action {
  const action = ACTIONS.find((candidate) => candidate === raw);
  if (action) return action;
  throw createError(
    'INVALID_ARGUMENT',
    raw === undefined ? `An action is required: ${ACTIONS.join(', ')}` : `Unknown abtest action: ${raw}`,
  );
}

export async function abtestCommand(options: CommandOptions): Promise<void> {
  const { values, positionals } = parseCommandArgs('abtest', {
    args: options.args,
    options: {
      ...GLOBAL_OPTIONS,
      split: { type: 'string' },
      'min-samples': { type: 'string' },
      alpha: { type: 'string' },
      control: { type: 'string' },
      treatment: { type: 'string' },
    },
    allowPositionals: true,
  });

  const action = parseAction(positionals[0]);
  const args = positionals.slice(1);
  if (args.length !== ARITY[action]) {
    throw createError('INVALID_ARGUMENT', `abtest ${action} takes ${ARITY[action]} argument(s), got ${args.length}`);
  }
  const json = options.context.json;

  await withService(options.context, async (service) => {
    switch (action) {
      case 'create': {
        const created = service.createAbTest({
          testName: args[0],
          trafficSplit: parseNumberFlag('split', values.split),
          minimumSampleSize: parseIntegerFlag('min-samples', values['min-samples']),
          significanceLevel: parseNumberFlag('alpha', values.alpha),
          controlVersion: values.control,
          treatmentVersion: values.treatment,
        });
        if (!created.ok) throw toCliError(created.error);
        if (json) {
          printJson(created.value);
          return;
        }
        console.log(
          `Created A/B test ${created.value.name}: ${created.value.minimumSampleSize} samples per variant, ` +
            `${Math.round(created.value.trafficSplit * 100)}% to ${created.value.treatmentVersion}`,
        );
        return;
      }
      case 'assign': {
        const variant = service.assignAbVariant(args[0], args[1]);
        if (json) printJson({ testName: args[0], userId: args[1], variant });
        else console.log(variant);
        return;
      }
      case 'record': {
        const outcome = parseOutcome(args[3]);
        const recorded = service.recordAbResult(args[0], args[1], args[2], outcome);
        if (!recorded.ok) throw toCliError(recorded.error);
        if (json) printJson(recorded.value);
        else console.log(`Recorded ${outcome} for ${args[2]} on variant ${args[1]}`);
        return;
      }
      case 'analyze': {
        const analysis = service.analyzeAbTest(args[0]);
        if (!analysis.ok) throw toCliError(analysis.error);
        if (json) printJson(analysis.value);
        else printAnalysis(analysis.value);
        return;
      }
      case 'list': {
        const tests = service.listAbTests();
        if (json) {
          printJson(tests);
          return;
        }
        if (tests.length === 0) {
          console.log('No A/B tests.');
          return;
        }
        printTable(
          ['Name', 'Control', 'Treatment', 'Split', 'Min samples', 'Alpha'],
          tests.map((test) => [
            test.name,
            test.controlVersion,
            test.treatmentVersion,
            String(test.trafficSplit),
            String(test.minimumSampleSize),
            String(test.significanceLevel),
          ]),
        );
        return;
      }
    }
  });
}

function parseOutcome(raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw createError('INVALID_ARGUMENT', `outcome must be a number, got "${raw}"`);
  }
  return value;
}

function printAnalysis(analysis: ABTestAnalysis): void {
  if (analysis.status === 'insufficient_data') {
    console.log(analysis.message);
    printKeyValue([
      { key: 'Control samples', value: analysis.sampleSizes.control },
      { key: 'Treatment samples', value: analysis.sampleSizes.treatment },
    ]);
    return;
  }
  printKeyValue([
    { key: 'Status', value: analysis.status },
    { key: 'Control mean', value: analysis.controlMean.toFixed(4) },
    { key: 'Treatment mean', value: analysis.treatmentMean.toFixed(4) },
    { key: 'Lift', value: analysis.lift === null ? null : `${analysis.lift.toFixed(2)}%` },
    { key: 'p-value', value: analysis.pValue.toPrecision(3) },
    { key: 'Effect size', value: analysis.effectSize === null ? null : analysis.effectSize.toFixed(3) },
    { key: 'Confidence level', value: analysis.confidenceLevel },
    { key: 'Samples', value: `${analysis.sampleSizes.control} / ${analysis.sampleSizes.treatment}` },
    { key: 'Recommendation', value: analysis.recommendation },
  ]);
}
