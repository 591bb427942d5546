export function log(level: "info" | "error", message: string, fields: Record<string, unknown> = {}) {
  console.log(JSON.stringify({ level, ts: new Date().toISOString(), message, ...fields }));
}
