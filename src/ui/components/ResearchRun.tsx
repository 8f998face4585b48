/**
 * Research Run Component
 *
 * Starts one research run when mounted and reports its outcome through
 * onFinish. Shows progress with the latest tool activity meanwhile.
 */
import { useEffect, useState } from 'react';
import type { ResearchRunOptions } from '../../agents/index.js';
import type { ResearchQueryInput, ResearchResult } from '../../models/research.js';
import { uiLogger } from '../../utils/logger.js';
import { describeToolCall } from '../session.js';
import { ResearchProgress } from './ResearchProgress.js';

export interface Researcher {
  research(input: ResearchQueryInput, options?: ResearchRunOptions): Promise<ResearchResult>;
}

export type ResearchOutcome = { ok: true; result: ResearchResult } | { ok: false; error: Error };

interface ResearchRunProps {
  researcher: Researcher;
  query: ResearchQueryInput;
  onFinish: (outcome: ResearchOutcome) => void;
}

export function ResearchRun({ researcher, query, onFinish }: ResearchRunProps) {
  const [activity, setActivity] = useState<string | null>(null);

  // One run per mount; callers remount (new key) to research again.
  useEffect(() => {
    let active = true;

    void researcher
      .research(query, {
        onToolCall: (name, args) => {
          if (active) setActivity(describeToolCall(name, args));
        },
      })
      .then(
        (result) => {
          if (active) onFinish({ ok: true, result });
        },
        (reason: unknown) => {
          const error = reason instanceof Error ? reason : new Error(String(reason));
          uiLogger.error({ error: error.message, stack: error.stack }, 'Research run failed');
          if (active) onFinish({ ok: false, error });
        }
      );

    return () => {
      active = false;
    };
  }, []);

  return <ResearchProgress activity={activity} />;
}
