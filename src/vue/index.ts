import { ref, shallowRef, onMounted, onUnmounted, type Ref, type ShallowRef, type ObjectDirective } from 'vue';
import { createMonitor, neutralReport } from '../index';
import type { HygieneConfigInput } from '../config';
import type { HygieneReport, Monitor, MonitorConfig, TimelineFrame } from '../types';

export interface UseKeyHygieneReturn {
  /** Template ref — bind to the element whose key events should be measured. */
  target: Ref<HTMLElement | null>;
  /** Latest statistics over the live window. */
  report: ShallowRef<HygieneReport>;
  /** Latest timeline frame, null before the first tick. */
  frame: ShallowRef<TimelineFrame | null>;
  /** Clear all collected data. */
  reset: () => void;
}

/**
 * Vue Composition API composable for key adhesion monitoring.
 * Bind the returned `target` ref to an element via `ref="target"`.
 */
export function useKeyHygiene(options?: HygieneConfigInput): UseKeyHygieneReturn {
  const target = ref<HTMLElement | null>(null);
  const report = shallowRef<HygieneReport>(neutralReport());
  const frame = shallowRef<TimelineFrame | null>(null);

  let monitor: Monitor | null = null;

  onMounted(() => {
    if (!target.value) return;
    monitor = createMonitor({
      ...options,
      scheduling: 'interval',
      onReport: (next) => { report.value = next; },
      onFrame: (next) => { frame.value = next; },
    });
    monitor.attach(target.value);
    monitor.start();
  });

  onUnmounted(() => {
    if (monitor) {
      monitor.destroy();
      monitor = null;
    }
  });

  function reset() {
    monitor?.reset();
    report.value = neutralReport();
    frame.value = null;
  }

  return { target, report, frame, reset };
}

/** Directive binding value: report callback or config with callback. */
type DirectiveBinding = ((report: HygieneReport) => void) | (HygieneConfigInput & {
  onReport: (report: HygieneReport) => void;
  onFrame?: (frame: TimelineFrame) => void;
});

const instanceMap = new WeakMap<HTMLElement, Monitor>();

/**
 * Vue directive for key adhesion monitoring.
 *
 * Usage:
 *   <textarea v-key-hygiene="onReport" />
 *   <textarea v-key-hygiene="{ onReport: handler, windowSeconds: 30 }" />
 */
export const vKeyHygiene: ObjectDirective<HTMLElement, DirectiveBinding> = {
  mounted(el, binding) {
    const value = binding.value;
    const config: MonitorConfig = typeof value === 'function'
      ? { onReport: value }
      : { ...value };
    config.scheduling = 'interval';

    const monitor = createMonitor(config);
    monitor.attach(el);
    monitor.start();
    instanceMap.set(el, monitor);
  },

  unmounted(el) {
    const monitor = instanceMap.get(el);
    if (monitor) {
      monitor.destroy();
      instanceMap.delete(el);
    }
  },
};
