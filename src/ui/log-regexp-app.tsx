/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import type { LogMatchOptions, LogMatchResult } from '../runner/index.js';
import { runLogMatch } from '../runner/index.js';
import type { MatchObserver } from '../types/index.js';

interface Stats {
  matched: number;
  unmatched: number;
}

interface Progress {
  processedLines: number;
  currentBatch: number;
  totalBatches: number;
}

interface AppState {
  specialization: string;
  pattern: string;
  fields: readonly string[];
  stats: Stats;
  progress: Progress;
  lastEvent: string;
}

const initialState: AppState = {
  specialization: '...',
  pattern: '',
  fields: [],
  stats: { matched: 0, unmatched: 0 },
  progress: { processedLines: 0, currentBatch: 0, totalBatches: 0 },
  lastEvent: 'Compiling...',
};

export interface LogRegexpAppProps {
  options: LogMatchOptions;
}

export const LogRegexpApp: React.FC<LogRegexpAppProps> = ({ options }) => {
  const [state, setState] = useState<AppState>(initialState);
  const [result, setResult] = useState<LogMatchResult | undefined>();
  const [error, setError] = useState<string | undefined>();
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const observer: MatchObserver = {
      onCompiled: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          specialization: info.specialization,
          pattern: info.pattern,
          fields: info.fields,
          lastEvent: `Compiled ${info.fields.length} capturing field(s)`,
        }));
      },

      onBatchProgress: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: {
            processedLines: info.processedLines,
            currentBatch: info.current,
            totalBatches: info.total ?? prev.progress.totalBatches,
          },
          lastEvent: `Processed batch ${info.current}/${info.total ?? '?'}`,
        }));
      },

      onMatched: () => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          stats: { ...prev.stats, matched: prev.stats.matched + 1 },
        }));
      },

      onUnmatched: (line) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          stats: { ...prev.stats, unmatched: prev.stats.unmatched + 1 },
          lastEvent: line.trace
            ? `[unmatched] line ${line.lineIndex + 1} reached: ${line.trace.trim() || '(none)'}`
            : `[unmatched] line ${line.lineIndex + 1}`,
        }));
      },
    };

    runLogMatch({ ...options, observer })
      .then((res) => {
        if (cancelled) return;
        setResult(res);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err instanceof Error ? err.message : String(err));
      });

    return () => {
      cancelled = true;
    };
  }, [options]);

  useEffect(() => {
    if (result || error) {
      const timer = setTimeout(() => exit(error ? new Error(error) : undefined), 200);
      return () => clearTimeout(timer);
    }
    return undefined;
  }, [result, error, exit]);

  const progressPercent = calculateProgress(state.stats);
  const progressBar = renderBar(progressPercent, 30);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          LOG REGEXP
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
        <Box>
          <Text dimColor>Specialization: </Text>
          <Text color="cyan">{state.specialization}</Text>
          <Text dimColor> | Fields: </Text>
          <Text>{state.fields.join(', ') || '(none)'}</Text>
        </Box>
        <Box>
          <Text dimColor>Pattern: </Text>
          <Text color="white">{state.pattern}</Text>
        </Box>
        <Box>
          <Text dimColor>Batch: </Text>
          <Text>
            {state.progress.currentBatch}/{state.progress.totalBatches || '?'}
          </Text>
          <Text dimColor> | Lines: </Text>
          <Text>{state.progress.processedLines}</Text>
          <Text dimColor> | Matched: </Text>
          <Text color="greenBright">{state.stats.matched}</Text>
          <Text dimColor> | Unmatched: </Text>
          <Text color="red">{state.stats.unmatched}</Text>
        </Box>
        <Box>
          <Text dimColor>Match rate: </Text>
          <Text color="greenBright">{progressBar}</Text>
          <Text color="white"> {progressPercent}%</Text>
        </Box>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="magenta" paddingX={1} paddingY={0}>
        <Text bold color="magenta">
          Activity:{' '}
        </Text>
        <Text>{state.lastEvent}</Text>
      </Box>

      {result && (
        <Box marginTop={1} borderStyle="double" borderColor="greenBright" flexDirection="column" paddingX={1} paddingY={0}>
          <Text bold color="greenBright">
            ✓ COMPLETE
          </Text>
          <Text>
            Run ID: <Text color="cyan">{result.runId}</Text>
          </Text>
          <Text>
            Processed {result.totalLines} lines | Matched {result.matched} | Unmatched {result.unmatched}
          </Text>
          {result.failureReportPath && (
            <Text color="red">Unmatched lines: {result.failureReportPath}</Text>
          )}
          <Text dimColor>Match report: {result.reportPath}</Text>
        </Box>
      )}

      {error && (
        <Box marginTop={1} borderStyle="bold" borderColor="red" paddingX={1} paddingY={0}>
          <Text color="redBright">ERROR: {error}</Text>
        </Box>
      )}
    </Box>
  );
};

function calculateProgress(stats: Stats): number {
  const total = stats.matched + stats.unmatched;
  if (total === 0) return 0;
  return Math.round((stats.matched / total) * 100);
}

function renderBar(percent: number, width: number): string {
  const filled = Math.round((percent / 100) * width);
  const empty = width - filled;
  return '█'.repeat(filled) + '░'.repeat(empty);
}
