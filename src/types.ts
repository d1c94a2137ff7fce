export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

export type FieldMap = Map<string, FieldValue>;

export type DecisionAction = "allow" | "block" | "challenge";

export type Verdict = "flagged" | "clean" | "unknown";

export type ReputationKind = "malicious" | "tor";

export interface InboundRequest {
  method: string;
  url: string;
  host: string;
  scheme: "http" | "https";
  path: string;
  query: Record<string, string | string[]>;
  headers: Record<string, string | undefined>;
  body: unknown;
  httpVersion: string;
  remoteAddress: string | null;
}

export interface AuditRecord {
  timestamp: number;
  ip: string | null;
  userAgent: string;
  httpVersion: string;
  action: DecisionAction;
}

export interface AuditEntry extends AuditRecord {
  fingerprint: string;
}

export interface RenderVariables {
  [key: string]: string | number | boolean;
}

export interface Decision {
  action: DecisionAction;
  status: number;
  reason: string;
  variables: RenderVariables;
}
