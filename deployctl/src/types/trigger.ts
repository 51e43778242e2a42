/** Trigger events and the descriptor produced by the trigger classifier. */
export const ENVIRONMENTS = ["development", "staging", "production"] as const;

export type EnvironmentName = (typeof ENVIRONMENTS)[number];

export type TriggerKind = "push" | "manual";

export type PushEvent = {
  event_name: "push";
  ref: string;
  sha: string;
  /** Files touched by the push; when absent the path filter is not applied. */
  changed_files?: string[];
};

export type DispatchEvent = {
  event_name: "workflow_dispatch";
  sha: string;
  ref?: string;
  inputs?: { environment?: string };
};

export type TriggerEvent = PushEvent | DispatchEvent;

export type TriggerDescriptor = {
  readonly kind: TriggerKind;
  readonly environment: EnvironmentName | null;
  readonly commit: string;
  readonly ref: string | null;
  /** Unique image tag for this run's artifact. */
  readonly artifact_tag: string;
};

export function isEnvironmentName(value: string): value is EnvironmentName {
  return (ENVIRONMENTS as readonly string[]).includes(value);
}
