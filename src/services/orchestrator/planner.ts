// Decision stage: user input + tool catalog -> invocation plan

import type { InferenceClient } from '../inference.js';
import type { ToolRegistry } from '../tools/registry.js';
import { getLogger } from '../../utils/logger.js';
import { buildDecisionPrompt } from './prompts.js';
import { parsePlan } from './plan-parser.js';
import type { InvocationPlan } from './types.js';

const log = getLogger('planner');

export class Planner {
  constructor(
    private inference: InferenceClient,
    private tools: ToolRegistry,
    private temperature: number = 0.7,
  ) {}

  buildPrompt(userInput: string): string {
    return buildDecisionPrompt(userInput, this.tools.getAll());
  }

  /**
   * Throws InferenceError when the model call fails and PlanParseError when
   * its reply holds no usable plan.
   */
  async plan(userInput: string): Promise<InvocationPlan> {
    if (this.tools.size === 0) {
      log.debug('Tool catalog is empty, skipping decision call');
      return [];
    }

    const output = await this.inference.complete(this.buildPrompt(userInput), this.temperature);
    const plan = parsePlan(output, this.tools);
    log.info({ plan }, `Planned ${plan.length} tool call(s)`);
    return plan;
  }
}
