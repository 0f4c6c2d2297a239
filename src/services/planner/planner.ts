// Trip Planner
// Runs the planning flows: orchestrated conversation, JSON extraction and schema
// validation, retried on rate limiting and bounded by a deadline

import type { z } from 'zod';
import type { ModelClient } from '../../providers/types.js';
import { ConversationOrchestrator } from '../orchestrator/orchestrator.js';
import { extractJson, type ExtractMode } from '../orchestrator/extractor.js';
import { MalformedOutputError } from '../orchestrator/errors.js';
import type { RetryController } from '../orchestrator/retry.js';
import { planningRegistry, weatherRegistry, type TripTools } from '../tools/index.js';
import type { ToolRegistry } from '../tools/registry.js';
import { withDeadline } from '../../utils/deadline.js';
import { AppError } from '../../utils/errors.js';
import { moduleLogger, type Logger } from '../../logger.js';
import {
  ActivityListSchema,
  ItineraryDocumentSchema,
  type Activity,
  type ItineraryDocument,
  type PlannedTrip,
  type TripRequest,
} from './itinerary.js';
import {
  buildBudgetRepairPrompt,
  buildPlanPrompt,
  buildRegeneratePrompt,
  buildWeatherAdjustPrompt,
} from './prompts.js';

export interface TripPlannerOptions {
  model: ModelClient;
  tools: TripTools;
  retry: RetryController;
  callBudget: number;
  deadlineMs: number;
  budgetRepair: boolean;
  logger?: Logger;
}

export function budgetWarning(total: number, budget: number): string {
  return `Estimated total of ${total} INR exceeds the budget of ${budget} INR.`;
}

export class TripPlanner {
  private readonly orchestrator: ConversationOrchestrator;
  private readonly log: Logger;

  constructor(private readonly options: TripPlannerOptions) {
    this.log = options.logger ?? moduleLogger('planner');
    this.orchestrator = new ConversationOrchestrator(options.model, this.log);
  }

  async planTrip(request: TripRequest): Promise<PlannedTrip> {
    this.log.info({ destination: request.destination, budget: request.budget }, 'Planning trip');
    return this.guarded('planTrip', async signal => {
      const itinerary = await this.generate(
        buildPlanPrompt(request),
        planningRegistry(this.options.tools),
        'object',
        ItineraryDocumentSchema,
        signal,
      );
      return this.withinBudget(request, itinerary, signal);
    });
  }

  async regenerate(original: PlannedTrip, changeRequest: string): Promise<PlannedTrip> {
    this.log.info({ destination: original.request.destination }, 'Regenerating itinerary');
    return this.guarded('regenerate', async signal => {
      const itinerary = await this.generate(
        buildRegeneratePrompt(original, changeRequest),
        planningRegistry(this.options.tools),
        'object',
        ItineraryDocumentSchema,
        signal,
      );
      return this.withinBudget(original.request, itinerary, signal);
    });
  }

  async adjustForWeather(destination: string, activities: Activity[]): Promise<Activity[]> {
    this.log.info({ destination, activities: activities.length }, 'Adjusting activities for weather');
    return this.guarded('adjustForWeather', signal =>
      this.generate(
        buildWeatherAdjustPrompt(destination, activities),
        weatherRegistry(this.options.tools),
        'array',
        ActivityListSchema,
        signal,
      ),
    );
  }

  // Deadline around the whole flow; every failure leaves as an AppError
  private async guarded<T>(label: string, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await withDeadline(this.options.deadlineMs, label, work);
    } catch (err) {
      throw this.options.retry.classify(err);
    }
  }

  private generate<T>(
    prompt: string,
    tools: ToolRegistry,
    mode: ExtractMode,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal: AbortSignal,
  ): Promise<T> {
    return this.options.retry.execute(async () => {
      const text = await this.orchestrator.run(prompt, tools, this.options.callBudget, { signal });
      const raw = extractJson(text, mode);
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new MalformedOutputError(`Model output does not match the expected shape (${issues.join('; ')})`, JSON.stringify(raw).slice(0, 500));
      }
      return parsed.data;
    }, { signal });
  }

  private async withinBudget(
    request: TripRequest,
    itinerary: ItineraryDocument,
    signal: AbortSignal,
  ): Promise<PlannedTrip> {
    const total = itinerary.cost_breakdown.total_estimate_inr;
    if (total <= request.budget) {
      return { request, itinerary, warnings: [] };
    }

    if (!this.options.budgetRepair) {
      this.log.warn({ total, budget: request.budget }, 'Itinerary exceeds budget');
      return { request, itinerary, warnings: [budgetWarning(total, request.budget)] };
    }

    this.log.warn({ total, budget: request.budget }, 'Itinerary exceeds budget, asking for a revision');
    let revised: ItineraryDocument;
    try {
      revised = await this.generate(
        buildBudgetRepairPrompt(request, itinerary),
        planningRegistry(this.options.tools),
        'object',
        ItineraryDocumentSchema,
        signal,
      );
    } catch (err) {
      if (!(err instanceof AppError) || signal.aborted) throw err;
      this.log.warn({ err }, 'Budget revision failed, keeping the first itinerary');
      return { request, itinerary, warnings: [budgetWarning(total, request.budget)] };
    }

    const revisedTotal = revised.cost_breakdown.total_estimate_inr;
    if (revisedTotal > request.budget) {
      this.log.warn({ total: revisedTotal, budget: request.budget }, 'Revised itinerary still exceeds budget');
      return { request, itinerary: revised, warnings: [budgetWarning(revisedTotal, request.budget)] };
    }
    return { request, itinerary: revised, warnings: [] };
  }
}
