import { Box, Text, useInput } from "ink";
import React, { useCallback, useRef, useState } from "react";
import type { ConfirmFn } from "@ferry/core";
import type { DoctorMenuEntry } from "../doctor-menu.js";

interface DoctorInkAppProps {
  entries: DoctorMenuEntry[];
  onExit: () => void;
}

const THEME = {
  accent: "cyan",
  muted: "gray",
  warn: "yellow"
} as const;

export function DoctorInkApp(props: DoctorInkAppProps): React.JSX.Element {
  const [output, setOutput] = useState<string[]>([]);
  const [busyLabel, setBusyLabel] = useState<string | null>(null);
  const [question, setQuestion] = useState<string | null>(null);
  const answerRef = useRef<((answer: boolean) => void) | null>(null);

  const confirm = useCallback<ConfirmFn>(
    (prompt) =>
      new Promise<boolean>((resolve) => {
        answerRef.current = resolve;
        setQuestion(prompt);
      }),
    []
  );

  const runEntry = useCallback(
    (entry: DoctorMenuEntry) => {
      setBusyLabel(entry.label);
      setOutput([]);
      void entry
        .run(confirm)
        .then((lines) => setOutput(lines))
        .catch((error: unknown) => {
          setOutput([`✗ ${error instanceof Error ? error.message : String(error)}`]);
        })
        .finally(() => setBusyLabel(null));
    },
    [confirm]
  );

  useInput((value, key) => {
    if (key.ctrl && value.toLowerCase() === "c") {
      props.onExit();
      return;
    }

    const answer = answerRef.current;
    if (answer) {
      answerRef.current = null;
      setQuestion(null);
      answer(value.toLowerCase() === "y");
      return;
    }

    if (busyLabel) {
      return;
    }
    if (value === "0" || value === "q") {
      props.onExit();
      return;
    }
    const entry = props.entries.find((candidate) => candidate.key === value.toLowerCase());
    if (entry) {
      runEntry(entry);
    }
  });

  return (
    <Box flexDirection="column" paddingX={1}>
      <Box borderStyle="round" borderColor={THEME.accent} paddingX={1} flexDirection="column">
        <Text bold color={THEME.accent}>ferry doctor</Text>
        {props.entries.map((entry) => (
          <Text key={entry.key}>{`${entry.key}. ${entry.label}`}</Text>
        ))}
        <Text color={THEME.muted}>0. Exit</Text>
      </Box>
      {busyLabel ? <Text color={THEME.warn}>{`${busyLabel}...`}</Text> : null}
      {question ? <Text color={THEME.warn}>{`${question} (y/n)`}</Text> : null}
      <Box flexDirection="column" marginTop={1}>
        {output.map((entry, index) => (
          <Text key={index}>{entry}</Text>
        ))}
      </Box>
    </Box>
  );
}
