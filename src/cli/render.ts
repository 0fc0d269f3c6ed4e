import { expressionToString } from "../core/tokens.js";
import type { EngineEvent } from "../core/engine.js";
import { planSummary } from "../core/planner.js";
import type { ApplyReport, Plan, ResourceChange } from "../core/types.js";

const symbol = (change: ResourceChange): string => {
  switch (change.action) {
    case "create":
      return "+";
    case "update":
      return "~";
    case "replace":
      return change.replaceOrder === "create_before_destroy" ? "+/-" : "-/+";
    case "delete":
      return "-";
    case "noop":
      return " ";
  }
};

const describeChange = (change: ResourceChange): string => {
  const target = change.deposedId === undefined ? change.address : `${change.address} (deposed ${change.deposedId})`;
  const head = `  ${symbol(change)} ${target}`;
  switch (change.action) {
    case "create":
    case "delete":
    case "noop":
      return head;
    case "update":
      return `${head}: ${change.changedAttributes.join(", ")}`;
    case "replace":
      return `${head}: ${change.forcesReplacement.join(", ")} forces replacement`;
  }
};

const attributeLines = (change: ResourceChange): string[] => {
  if (change.action !== "create" || change.after === undefined) {
    return [];
  }
  return Object.entries(change.after).map(([key, value]) => `      ${key} = ${expressionToString(value)}`);
};

export const formatPlan = (plan: Plan, verbose = false): string => {
  const changes = plan.changes.filter((c) => c.action !== "noop");
  if (changes.length === 0) {
    return "No changes. Infrastructure matches the declarations.";
  }

  const lines: string[] = [];
  for (const change of changes) {
    lines.push(describeChange(change));
    if (verbose) lines.push(...attributeLines(change));
  }
  for (const diagnostic of plan.diagnostics) {
    lines.push(`${diagnostic.severity}: ${diagnostic.address}: ${diagnostic.message}`);
  }

  const summary = planSummary(plan);
  lines.push(
    "",
    `Plan: ${summary.create} to create, ${summary.update} to update, ${summary.replace} to replace, ${summary.delete} to delete.`,
  );
  return lines.join("\n");
};

/** One line per event, or null for events not worth printing. */
export const formatEvent = (event: EngineEvent): string | null => {
  switch (event.type) {
    case "step_start":
      return event.attempt === 1 ? `${event.step.id}: started` : null;
    case "step_retry":
      return `${event.step.id}: attempt ${event.attempt} failed (${event.message}); retrying in ${event.delayMs}ms`;
    case "step_applied":
      return event.step.operation === "noop" ? null : `${event.step.id}: done`;
    case "step_failed":
      return `${event.step.id}: failed: ${event.message}`;
    case "step_skipped":
      return `${event.step.id}: skipped, ${event.cause} did not complete`;
    case "step_cancelled":
      return `${event.step.id}: cancelled`;
    case "refreshed":
      return event.dropped.length === 0 && event.drifted.length === 0
        ? null
        : `Refreshed state: ${event.dropped.length} gone, ${event.drifted.length} drifted`;
    case "unlock_failed":
      return `Warning: could not release lock ${event.lockId}: ${event.message}`;
    case "locked":
    case "unlocked":
      return null;
  }
};

export const formatReport = (report: ApplyReport): string => {
  const count = (status: string): number => report.steps.filter((s) => s.status === status).length;
  const lines = [
    `Apply ${report.result.replace("_", " ")}: ${count("applied")} applied, ${count("failed")} failed, ${count("skipped")} skipped, ${count("cancelled")} cancelled (${report.durationMs}ms).`,
  ];
  for (const error of report.errors) {
    lines.push(`  ${error}`);
  }
  return lines.join("\n");
};
