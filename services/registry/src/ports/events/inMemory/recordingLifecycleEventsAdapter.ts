import type { LifecycleEvent, LifecycleEventsPort } from '../lifecycleEventsPort';

export type RecordingLifecycleEvents = LifecycleEventsPort & {
  readonly events: LifecycleEvent[];
  kinds(): LifecycleEvent['kind'][];
};

/** Keeps every published event in order; used where a caller needs to inspect emissions. */
export const createRecordingLifecycleEventsAdapter = (): RecordingLifecycleEvents => {
  const events: LifecycleEvent[] = [];
  return {
    events,
    async publish(event) {
      events.push(event);
    },
    kinds() {
      return events.map((event) => event.kind);
    }
  };
};
