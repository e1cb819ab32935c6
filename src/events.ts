// Pipeline events: the only channel from the pipeline stages to whoever presents them.
// Stages emit immutable values into a sink and move on. Thread affinity, throttling
// and rendering are the presenter's concern (see output.ts createProgressPrinter).

export type PipelineEvent =
  | { readonly type: 'status'; readonly message: string }
  | { readonly type: 'progress'; readonly processed: number; readonly total: number }

export type EventSink = (event: PipelineEvent) => void

export const noopSink: EventSink = () => {}

export function status(sink: EventSink, message: string): void {
  const event: PipelineEvent = { type: 'status', message }
  sink(Object.freeze(event))
}

/** Clamps processed into [0, total] so presenters never see a bar overflow. */
export function progress(sink: EventSink, processed: number, total: number): void {
  const event: PipelineEvent = { type: 'progress', processed: Math.min(Math.max(processed, 0), total), total }
  sink(Object.freeze(event))
}
