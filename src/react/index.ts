import { useRef, useState, useCallback, useEffect } from 'react';
import { createMonitor, neutralReport } from '../index';
import type { HygieneConfigInput } from '../config';
import type { HygieneReport, Monitor, TimelineFrame } from '../types';

export interface UseKeyHygieneOptions extends HygieneConfigInput {
  /** Start capturing as soon as an element is attached. Default: true */
  autoStart?: boolean;
}

export interface UseKeyHygieneReturn {
  /** Callback ref — attach to any element that receives keyboard input. */
  ref: (node: HTMLElement | null) => void;
  /** Latest statistics over the live window. */
  report: HygieneReport;
  /** Latest timeline frame, null before the first tick. */
  frame: TimelineFrame | null;
  /** Clear all collected data. */
  reset: () => void;
}

/**
 * React hook that wraps createMonitor with ref + state management.
 * Attach the returned `ref` to the element whose key events should be measured.
 */
export function useKeyHygiene(options?: UseKeyHygieneOptions): UseKeyHygieneReturn {
  const monitorRef = useRef<Monitor | null>(null);
  const [report, setReport] = useState<HygieneReport>(neutralReport);
  const [frame, setFrame] = useState<TimelineFrame | null>(null);

  // Stable config ref to avoid re-creating the monitor on every render
  const configRef = useRef(options);
  configRef.current = options;

  const ref = useCallback((node: HTMLElement | null) => {
    if (monitorRef.current) {
      monitorRef.current.destroy();
      monitorRef.current = null;
    }

    if (node) {
      const { autoStart = true, ...config } = configRef.current ?? {};
      const monitor = createMonitor({
        ...config,
        scheduling: 'interval',
        onReport: setReport,
        onFrame: setFrame,
      });
      monitor.attach(node);
      if (autoStart) monitor.start();
      monitorRef.current = monitor;
    }
  }, []);

  useEffect(() => {
    return () => {
      if (monitorRef.current) {
        monitorRef.current.destroy();
        monitorRef.current = null;
      }
    };
  }, []);

  const reset = useCallback(() => {
    monitorRef.current?.reset();
    setReport(neutralReport());
    setFrame(null);
  }, []);

  return { ref, report, frame, reset };
}
