/** Simple type aliases for documentation; the service hands out opaque string ids */
export type ProjectId = string;
export type TaskId = string;
export type LabelId = string;

export interface RemoteProject {
  readonly id: ProjectId;
  readonly name: string;
  readonly parentId: ProjectId | null;
}

export interface DueDescriptor {
  readonly date: string; // yyyy-MM-dd
  readonly string?: string;
  readonly lang?: string;
  readonly datetime?: string | null;
  readonly timezone?: string | null;
  readonly isRecurring?: boolean;
}

export interface RemoteTask {
  readonly id: TaskId;
  readonly content: string;
  readonly createdAt: string; // ISO string
  readonly due: DueDescriptor | null;
  readonly labels: readonly string[];
  readonly projectId: ProjectId;
}

export interface RemoteLabel {
  readonly id: LabelId;
  readonly name: string;
}

/** Fields accepted by a task update: a due-date directive or a full label set */
export type TaskUpdate =
  | { readonly kind: 'due'; readonly dueString: string; readonly dueLang: string }
  | { readonly kind: 'labels'; readonly labels: readonly string[] };
