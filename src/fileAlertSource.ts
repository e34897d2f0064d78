// JSON file alert source.
// Reads alerts exported from another scanner (or written by hand) so the
// pipeline can run without GitHub's alert API. The file holds either an
// array of alert records or an object with a `value` array, the shape
// returned by most REST list endpoints.
// Limitations: The whole file is read into memory.

import { readFile } from "fs/promises";
import { z } from "zod";

import { logger } from "./logger.js";
import type { Alert, AlertKind, AlertSeverity, AlertSource } from "./types.js";

const IdSchema = z.union([z.string().min(1), z.number()]);

const RecommendationSchema = z.union([
  z.string(),
  z.object({ text: z.string() }),
]);

export const AlertRecordSchema = z
  .object({
    id: IdSchema.optional(),
    alertId: IdSchema.optional(),
    kind: z.string().optional(),
    alertType: z.string().optional(),
    severity: z.string().optional(),
    state: z.string().optional(),
    title: z.string(),
    description: z.string().optional(),
    codeSnippet: z.string().optional(),
    recommendations: z.array(RecommendationSchema).optional(),
  })
  .refine((record) => record.id !== undefined || record.alertId !== undefined, {
    message: "Either id or alertId is required",
  });

export type AlertRecord = z.infer<typeof AlertRecordSchema>;

export const AlertFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ value: z.array(z.unknown()) }),
]);

const SEVERITIES: readonly AlertSeverity[] = ["critical", "high", "medium", "low"];

function toKind(value: string | undefined): AlertKind {
  const normalized = (value ?? "").toLowerCase().replace(/[^a-z]/g, "");
  if (normalized.startsWith("dependenc")) return "dependency";
  if (normalized.startsWith("code")) return "code";
  return "other";
}

function toSeverity(value: string | undefined): AlertSeverity {
  const normalized = (value ?? "").trim().toLowerCase();
  return SEVERITIES.find((severity) => severity === normalized) ?? "unknown";
}

export function toAlert(record: AlertRecord): Alert {
  const id = record.id ?? record.alertId ?? "";
  const alert: Alert = {
    id: String(id),
    kind: toKind(record.kind ?? record.alertType),
    severity: toSeverity(record.severity),
    state: record.state?.trim().toLowerCase() || "unknown",
    title: record.title,
    description: record.description ?? "",
    recommendations: (record.recommendations ?? []).map((item) =>
      typeof item === "string" ? item : item.text
    ),
  };
  return record.codeSnippet === undefined ? alert : { ...alert, codeSnippet: record.codeSnippet };
}

export function parseAlertFile(raw: unknown, origin: string): Alert[] {
  const file = AlertFileSchema.safeParse(raw);
  if (!file.success) {
    throw new Error(
      `Alerts file ${origin} must hold an array of alerts or an object with a "value" array.`
    );
  }

  const records = Array.isArray(file.data) ? file.data : file.data.value;
  const alerts: Alert[] = [];
  records.forEach((entry, index) => {
    const parsed = AlertRecordSchema.safeParse(entry);
    if (!parsed.success) {
      logger.warn("Dropping invalid alert record.", {
        file: origin,
        index,
        issue: parsed.error.issues[0]?.message ?? "invalid record",
      });
      return;
    }
    alerts.push(toAlert(parsed.data));
  });

  return alerts;
}

export class FileAlertSource implements AlertSource {
  readonly name = "file";
  private path: string;

  constructor(path: string) {
    this.path = path;
  }

  async fetchAlerts(): Promise<Alert[]> {
    const text = await readFile(this.path, "utf-8");
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Alerts file ${this.path} is not valid JSON: ${message}`);
    }
    const alerts = parseAlertFile(raw, this.path);
    logger.debug(`Read ${alerts.length} alert(s) from file.`, { file: this.path });
    return alerts;
  }
}
