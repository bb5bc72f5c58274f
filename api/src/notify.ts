// notify.ts
import type { TaskInstance } from "./today.js";

export type TaskSummary = {
  time: string;
  person: string;
  action: string;
  label: string;
};

/** What the display and speech side gets told. Methods may be async; failures are logged by the caller. */
export interface TaskNotifier {
  onTaskFired(instance: TaskInstance, displayText: string, speechText: string): void | Promise<void>;
  onNextTaskChanged(summary: TaskSummary | null): void | Promise<void>;
  onLastTaskChanged(summary: TaskSummary | null): void | Promise<void>;
}

const line = (s: TaskSummary | null) => (s ? `${s.time} ${s.person}: ${s.label}` : "none");

export class ConsoleNotifier implements TaskNotifier {
  onTaskFired(instance: TaskInstance, displayText: string, speechText: string): void {
    console.log(`🔔 ${instance.key.time} ${displayText}`);
    console.log(`   says: ${speechText}`);
  }

  onNextTaskChanged(summary: TaskSummary | null): void {
    console.log(`Next: ${line(summary)}`);
  }

  onLastTaskChanged(summary: TaskSummary | null): void {
    console.log(`Last: ${line(summary)}`);
  }
}
