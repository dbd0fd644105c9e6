/**
 * Action Registry - Typed dispatch for workflow and rule actions
 *
 * Stored actions carry a free-form `{ kind, config }`. The registry validates
 * the pair against the schema of its kind, producing a tagged union that is
 * dispatched exhaustively to the injected executors.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { ActionConfigError } from './errors';
import { isActionKind, type ActionKind, type JsonObject } from './types';

const logger = createLogger('actions');

// =============================================================================
// CONFIG SCHEMAS
// =============================================================================

const jsonObjectSchema = z.record(z.unknown());

const generateResponseSchema = z
  .object({
    tone: z.string().default('professional'),
    auto_publish: z.boolean().default(false),
    review_id: z.string().optional(),
  })
  .passthrough();

const sendNotificationSchema = z
  .object({
    channels: z.array(z.string()).default([]),
    priority: z.string().optional(),
    severity: z.string().optional(),
    message_template: z.string().optional(),
    alert_rule_id: z.string().optional(),
    config: jsonObjectSchema.nullable().optional(),
  })
  .passthrough();

const generateReportSchema = z
  .object({
    report_type: z.string().min(1),
    format: z.string().default('pdf'),
    filters: jsonObjectSchema.nullable().optional(),
    delivery_method: z.string().default('download'),
    delivery_config: jsonObjectSchema.nullable().optional(),
    email_recipients: z.array(z.string()).optional(),
  })
  .passthrough();

const updateStatusSchema = z
  .object({
    status: z.string().min(1),
    target_id: z.string().optional(),
  })
  .passthrough();

const sendEmailSchema = z
  .object({
    to: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
    subject: z.string().default(''),
    template: z.string().optional(),
  })
  .passthrough();

const webhookCallSchema = z
  .object({
    url: z.string().url(),
    method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']).default('POST'),
    headers: z.record(z.string()).optional(),
    body: z.unknown().optional(),
  })
  .passthrough();

const taskActionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('generate_response'), config: generateResponseSchema }),
  z.object({ kind: z.literal('send_notification'), config: sendNotificationSchema }),
  z.object({ kind: z.literal('generate_report'), config: generateReportSchema }),
  z.object({ kind: z.literal('update_status'), config: updateStatusSchema }),
  z.object({ kind: z.literal('send_email'), config: sendEmailSchema }),
  z.object({ kind: z.literal('webhook_call'), config: webhookCallSchema }),
]);

/** A validated action: the kind plus the config shape that kind requires. */
export type TaskAction = z.infer<typeof taskActionSchema>;

export type ActionConfig<K extends ActionKind> = Extract<TaskAction, { kind: K }>['config'];

// =============================================================================
// EXECUTORS
// =============================================================================

/** Where an action invocation comes from. */
export interface ActionContext {
  taskId: string | null;
  workflowId: string | null;
  ruleId: string | null;
  /** Event payload, for actions fired by an automation rule */
  payload: JsonObject | null;
}

export type ActionExecutor<K extends ActionKind> = (
  config: ActionConfig<K>,
  context: ActionContext,
) => Promise<unknown>;

/** One handler per action kind. Resolve with a result payload, reject on failure. */
export type ActionExecutors = { [K in ActionKind]: ActionExecutor<K> };

export interface ActionRegistry {
  /** Validate a stored kind/config pair. Throws ActionConfigError. */
  parse(kind: string, config: JsonObject): TaskAction;
  /** Validate and run. Rejects with the executor's error or ActionConfigError. */
  execute(kind: string, config: JsonObject, context: ActionContext): Promise<unknown>;
}

export function createActionRegistry(executors: ActionExecutors): ActionRegistry {
  function parse(kind: string, config: JsonObject): TaskAction {
    if (!isActionKind(kind)) {
      throw new ActionConfigError(kind, 'unknown action kind');
    }

    const parsed = taskActionSchema.safeParse({ kind, config });
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.slice(1).join('.') || 'config'}: ${issue.message}`)
        .join('; ');
      throw new ActionConfigError(kind, detail);
    }
    return parsed.data;
  }

  function dispatch(action: TaskAction, context: ActionContext): Promise<unknown> {
    switch (action.kind) {
      case 'generate_response':
        return executors.generate_response(action.config, context);
      case 'send_notification':
        return executors.send_notification(action.config, context);
      case 'generate_report':
        return executors.generate_report(action.config, context);
      case 'update_status':
        return executors.update_status(action.config, context);
      case 'send_email':
        return executors.send_email(action.config, context);
      case 'webhook_call':
        return executors.webhook_call(action.config, context);
      default: {
        const unhandled: never = action;
        throw new ActionConfigError(String(unhandled), 'no executor for action kind');
      }
    }
  }

  return {
    parse,

    async execute(kind: string, config: JsonObject, context: ActionContext): Promise<unknown> {
      return dispatch(parse(kind, config), context);
    },
  };
}

// =============================================================================
// DEFAULT EXECUTORS
// =============================================================================

/**
 * Executors that only log what they would do. Used at boot until real
 * response, notification, report and delivery transports are registered.
 */
export function createLoggingExecutors(): ActionExecutors {
  return {
    async generate_response(config, context) {
      logger.info({ taskId: context.taskId, tone: config.tone, reviewId: config.review_id }, 'Generate response');
      return { responsesGenerated: 0, autoPublish: config.auto_publish };
    },

    async send_notification(config, context) {
      logger.info(
        { taskId: context.taskId, channels: config.channels, severity: config.severity },
        'Send notification',
      );
      return { notificationsSent: config.channels.length };
    },

    async generate_report(config, context) {
      logger.info(
        { taskId: context.taskId, reportType: config.report_type, format: config.format },
        'Generate report',
      );
      return { reportGenerated: true, reportType: config.report_type, format: config.format };
    },

    async update_status(config, context) {
      logger.info({ taskId: context.taskId, status: config.status, targetId: config.target_id }, 'Update status');
      return { status: config.status };
    },

    async send_email(config, context) {
      const recipients = Array.isArray(config.to) ? config.to : [config.to];
      logger.info({ taskId: context.taskId, recipients: recipients.length, subject: config.subject }, 'Send email');
      return { emailsSent: recipients.length };
    },

    async webhook_call(config, context) {
      logger.info({ taskId: context.taskId, method: config.method, url: config.url }, 'Webhook call');
      return { delivered: false, method: config.method, url: config.url };
    },
  };
}
