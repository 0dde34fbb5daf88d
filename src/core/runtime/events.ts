export type RingId = number;
export type FiberId = number;

/** Timestamp en ns, tal como lo reporta el proceso instrumentado. */
export type Timestamp = bigint;

export type Phase = "begin" | "end";

export type RawEvent =
    | {
          type: "fiber.scheduled";
          fiberId: FiberId;
      }
    | {
          type: "fiber.created";
          fiberId: FiberId;
          scopeId: number;
      }
    | {
          type: "scope.opened";
          scopeId: number;
          kind: string;
      }
    | {
          type: "object.created";
          objectId: number;
          kind: string;
      }
    | {
          type: "fiber.exited";
          fiberId: FiberId;
      }
    | {
          type: "object.named";
          objectId: number;
          name: string;
      }
    | {
          type: "fiber.suspending";
          operation: string;
      }
    | {
          type: "span.entered";
          name: string;
      }
    | {
          type: "span.exited";
      }
    | {
          type: "scope.closed";
      }
    | {
          type: "log";
          message: string;
      }
    | {
          type: "ring.idle";
          phase: Phase;
      }
    | {
          type: "gc";
          phase: Phase;
          name: string;
      }
    | {
          // newer producers may emit kinds we don't know yet
          type: "unrecognized";
          kind: string;
      };

export type RawEventType = RawEvent["type"];

export type RawEventRecord = {
    ringId: RingId;
    ts: Timestamp;
    event: RawEvent;
};

export interface CursorCallbacks {
    onEvent(ringId: RingId, ts: Timestamp, ev: RawEvent): void;
    onLost(ringId: RingId, count: number): void;
}
