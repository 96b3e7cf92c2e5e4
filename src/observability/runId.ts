/** `<command>_<utc timestamp>_<random suffix>`, e.g. `report_20240502T140512Z_k3v9qa`. */
export function createRunId(command: string, now = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
  const suffix = Math.random().toString(36).slice(2, 8).padEnd(6, "0");
  return `${command}_${stamp}_${suffix}`;
}
