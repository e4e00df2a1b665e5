export interface Obligation {
  id: number;
  task: string;
  description: string;
  /** ISO-8601 instant the reminder is due. */
  fire_at: string;
  created_at: string;
  completed: boolean;
  notified: boolean;
}

export interface NewReminder {
  task: string;
  when: string;
  description?: string;
}

export interface SchedulerOptions {
  intervalMs: number;
  backoffMs: number;
  firingWindowMs: number;
}
