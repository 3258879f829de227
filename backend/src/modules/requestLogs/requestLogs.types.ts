export interface RequestLogEntry {
  ts: string;
  method: string;
  path: string;
  status: number;
  user: string | null;
  ip: string | null;
  durationMs: number;
}
