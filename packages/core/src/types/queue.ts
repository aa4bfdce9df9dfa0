export interface QueueConfig {
  /** Plain project name or a "/"-delimited path such as "Chores/Rotating Chore Queue" */
  readonly queueName: string;
  /** Natural-language due string handed to the service, e.g. "today 6pm" */
  readonly dueExpression: string;
  readonly locale: string;
  readonly promoteLabel: string | null;
  readonly clearDueOnRest: boolean;
}

export type PromotionStatus = 'ok' | 'empty' | 'project_not_found' | 'error';

/** One outcome per queue per run */
export type PromotionResult =
  | {
      readonly status: 'ok';
      readonly queueName: string;
      readonly promotedTaskTitle: string;
      readonly dueExpression: string;
      readonly demotedCount: number;
      readonly labelApplied: boolean;
      readonly label: string | null;
    }
  | { readonly status: 'empty'; readonly queueName: string }
  | { readonly status: 'project_not_found'; readonly queueName: string }
  | { readonly status: 'error'; readonly queueName: string; readonly errorDetail: string };
