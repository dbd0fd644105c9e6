/**
 * Predefined workflow templates
 */

import type { AutomationAdmin, CreateWorkflowInput } from './admin';
import { RecordNotFoundError } from './errors';
import type { ActionSpec, JsonObject, TriggerKind, Workflow } from './types';

export interface WorkflowTemplate {
  id: string;
  name: string;
  description: string;
  triggerKind: TriggerKind;
  triggerConfig: JsonObject;
  actions: ActionSpec[];
}

export const WORKFLOW_TEMPLATES: readonly WorkflowTemplate[] = [
  {
    id: 'auto_response',
    name: 'Auto Response Generation',
    description: 'Automatically generate AI responses for new reviews',
    triggerKind: 'event',
    triggerConfig: {
      event: 'new_review',
      conditions: { rating_threshold: 3, platforms: ['Google', 'Yelp'] },
    },
    actions: [{ kind: 'generate_response', config: { tone: 'professional', auto_publish: false } }],
  },
  {
    id: 'weekly_report',
    name: 'Weekly Performance Report',
    description: 'Generate and email weekly performance reports',
    triggerKind: 'schedule',
    triggerConfig: { type: 'cron', expression: '0 9 * * 1', timezone: 'UTC' },
    actions: [{ kind: 'generate_report', config: { report_type: 'weekly', format: 'pdf', email_recipients: [] } }],
  },
  {
    id: 'urgent_review_alert',
    name: 'Urgent Review Alert',
    description: 'Send alerts for low-rated reviews requiring immediate attention',
    triggerKind: 'event',
    triggerConfig: {
      event: 'new_review',
      conditions: { rating_max: 2, sentiment: 'Negative' },
    },
    actions: [
      {
        kind: 'send_notification',
        config: { channels: ['email', 'in_app'], priority: 'high', message_template: 'urgent_review' },
      },
    ],
  },
];

export function getWorkflowTemplate(templateId: string): WorkflowTemplate | undefined {
  return WORKFLOW_TEMPLATES.find((template) => template.id === templateId);
}

export type TemplateOverrides = Partial<Pick<CreateWorkflowInput, 'userId' | 'name' | 'description' | 'status' | 'maxExecutions'>>;

/**
 * Create a workflow from a template. The template's trigger and actions are
 * copied, so later changes to the template never reach existing workflows.
 */
export function createWorkflowFromTemplate(
  admin: AutomationAdmin,
  templateId: string,
  overrides: TemplateOverrides = {},
): Workflow {
  const template = getWorkflowTemplate(templateId);
  if (!template) throw new RecordNotFoundError('Workflow template', templateId);

  return admin.createWorkflow({
    name: template.name,
    description: template.description,
    ...overrides,
    triggerKind: template.triggerKind,
    triggerConfig: structuredClone(template.triggerConfig),
    actions: template.actions.map((action) => ({ kind: action.kind, config: structuredClone(action.config) })),
  });
}
