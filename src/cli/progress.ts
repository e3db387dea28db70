import chalk from "chalk";
import path from "node:path";
import type { EngineEvent } from "../core/events.js";

export type ProgressMode = "live" | "none";

type TaskStatus = "running" | "ok" | "fail" | "skip" | "warn";

type Task = {
  label: string;
  status: TaskStatus;
  detail?: string;
  startedAt?: number;
  endedAt?: number;
};

const icons: Record<TaskStatus, string> = {
  running: "⏳",
  ok: "✅",
  fail: "❌",
  skip: "⏭",
  warn: "⚠️",
};

function fmtMs(ms: number) {
  const s = Math.max(0, Math.round(ms / 1000));
  const m = Math.floor(s / 60);
  const sec = s % 60;
  if (m > 0) return `${m}m${sec.toString().padStart(2, "0")}s`;
  return `${s}s`;
}

function describe(data: Record<string, unknown> | undefined) {
  if (!data) return undefined;
  const parts = Object.entries(data)
    .filter(([, v]) => typeof v === "number" || typeof v === "string")
    .map(([k, v]) => `${k}=${String(v)}`);
  return parts.length ? parts.join(" ") : undefined;
}

export class ProgressReporter {
  private readonly mode: ProgressMode;
  private readonly tasks: Map<string, Task> = new Map();
  private readonly print: (line: string) => void;

  constructor(mode: ProgressMode, print: (line: string) => void = console.log) {
    this.mode = mode;
    this.print = print;
  }

  private printLine(task: Task) {
    if (this.mode === "none") return;
    const elapsed =
      task.startedAt && task.endedAt ? fmtMs(task.endedAt - task.startedAt) : "";
    const statusColor =
      task.status === "ok"
        ? chalk.greenBright
        : task.status === "fail"
          ? chalk.redBright
          : task.status === "skip"
            ? chalk.gray
            : task.status === "warn"
              ? chalk.yellow
              : chalk.cyanBright;
    const parts = [
      statusColor(`${icons[task.status]} ${task.label}`),
      elapsed ? chalk.dim(elapsed) : "",
      task.detail ? chalk.yellow(task.detail) : "",
    ].filter(Boolean);
    this.print(parts.join("  "));
  }

  private upsertTask(key: string, partial: Partial<Task>) {
    const existing = this.tasks.get(key);
    const merged: Task = {
      label: partial.label ?? existing?.label ?? key,
      status: partial.status ?? existing?.status ?? "running",
      detail: partial.detail ?? existing?.detail,
      startedAt: partial.startedAt ?? existing?.startedAt,
      endedAt: partial.endedAt ?? existing?.endedAt,
    };
    this.tasks.set(key, merged);
    this.printLine(merged);
  }

  log(event: EngineEvent) {
    if (this.mode === "none") return;

    if (event.type === "stage-start") {
      const key = `stage:${event.stage ?? ""}`;
      this.upsertTask(key, {
        label: `Stage: ${event.stage ?? ""}`,
        status: "running",
        startedAt: Date.now(),
      });
      return;
    }
    if (event.type === "stage-end") {
      const key = `stage:${event.stage ?? ""}`;
      this.upsertTask(key, {
        status: event.success === false ? "fail" : "ok",
        endedAt: Date.now(),
        detail: event.success === false ? "stage failed" : describe(event.data),
      });
      return;
    }
    if (event.type === "step-end") {
      const name = String(event.data?.name ?? "step");
      const status: TaskStatus =
        event.data?.status === "fail"
          ? "fail"
          : event.data?.status === "skip"
            ? "skip"
            : "ok";
      this.upsertTask(`step:${event.stage ?? ""}:${name}`, {
        label: `Step: ${name}`,
        status,
        detail: event.data?.error ? String(event.data.error) : undefined,
      });
      return;
    }
    if (event.type === "artifact-written" && event.file) {
      this.upsertTask(`file:${event.file}`, {
        label: `Artifact: ${path.basename(event.file)}`,
        status: "ok",
      });
      return;
    }
    if (event.type === "warning") {
      const reason = event.data?.reason;
      this.upsertTask(`warn:${this.tasks.size}`, {
        label: event.file ? `Skipped: ${path.basename(event.file)}` : "Warning",
        status: "warn",
        detail: typeof reason === "string" ? reason : describe(event.data),
      });
    }
  }
}

export function progressModeFromOpts(opts: { quiet?: boolean }): ProgressMode {
  return opts.quiet ? "none" : "live";
}
