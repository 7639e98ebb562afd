export type ActorContext = {
  userId: string;
  roles?: string[];
};

export type EventMeta = {
  actor: ActorContext;
  source: "system" | "user" | "translator";
  planId?: string;
  description?: string;
};

export type DomainEvent<TPayload = unknown> = {
  id: string;
  aggregateId: string;
  type: string;
  timestamp: string;
  payload: TPayload;
  meta: EventMeta;
};

export type EventFilter = {
  types?: string[];
  planId?: string;
};

export * from "./plan";
export * from "./errors";
export * from "./logger";
export * from "./env";
