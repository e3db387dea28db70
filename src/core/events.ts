export type EngineEventType =
  | "stage-start"
  | "stage-end"
  | "step-end"
  | "warning"
  | "artifact-written";

export type EngineEvent = {
  type: EngineEventType;
  timestamp: string;
  stage?: string;
  file?: string;
  success?: boolean;
  data?: Record<string, unknown>;
};

export type EngineEventListener = (event: EngineEvent) => void;

let globalListener: EngineEventListener | null = null;

export function setEngineEventListener(listener: EngineEventListener | null) {
  globalListener = listener;
}

export function emitEngineEvent(
  event: Omit<EngineEvent, "timestamp">,
  local?: EngineEventListener,
) {
  const enriched: EngineEvent = {
    ...event,
    timestamp: new Date().toISOString(),
  };
  for (const listener of [local, globalListener]) {
    if (!listener) continue;
    try {
      listener(enriched);
    } catch (err) {
      // a broken progress display must not abort an import
      console.debug("[innodash] event listener failed", err);
    }
  }
}
