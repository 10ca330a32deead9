export type ConvSkipReason =
  | "input_not_channels_last"
  | "weight_not_channels_last"
  | "depthwise_handled_elsewhere"
  | "non_cpu_device"
  | "input_size_not_concrete";

export type TraceEvent =
  | {
      type: "conv_skipped";
      nodeId: number;
      reason: ConvSkipReason;
    }
  | {
      type: "prepack_inserted";
      convNodeId: number;
      prepackNodeId: number;
      runNodeId: number;
    }
  | {
      type: "pattern_rewritten";
      pattern: string;
      anchorNodeId: number;
    }
  | {
      type: "constant_propagated";
      nodeId: number;
      op: string;
    }
  | {
      type: "prepack_folded";
      nodeId: number;
      attr: string;
    }
  | {
      type: "prepack_fold_skipped";
      nodeId: number;
      reason: string;
    }
  | {
      type: "graph_debug";
      stage: string;
      graph: string;
    };

export class TraceRecorder {
  private readonly events: TraceEvent[] = [];

  record(event: TraceEvent): void {
    this.events.push(event);
  }

  snapshot(): TraceEvent[] {
    return this.events.slice();
  }
}

/**
 * Options shared by every pass: where trace events go and whether graph
 * snapshots are logged.
 */
export type PassOptions = {
  trace?: TraceRecorder;
  debug?: boolean;
};
