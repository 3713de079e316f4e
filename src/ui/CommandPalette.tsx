import React, { useEffect, useMemo, useState } from "react";
import { Box, Text, useInput } from "ink";
import type { CommandDefinition } from "../types/commands";

interface CommandPaletteProps {
  isOpen: boolean;
  commands: readonly CommandDefinition[];
  onClose: () => void;
  onExecute: (command: string) => void;
}

export function commandStem(command: string): string {
  const placeholder = command.indexOf("<");
  return placeholder === -1 ? command : command.slice(0, placeholder);
}

export function CommandPalette({
  isOpen,
  commands,
  onClose,
  onExecute
}: CommandPaletteProps): React.JSX.Element | null {
  const [query, setQuery] = useState("");
  const [selected, setSelected] = useState(0);

  const filtered = useMemo(() => {
    const q = query.trim().toLowerCase().replace(/^\//, "");
    if (!q) return commands;
    const verb = q.split(/\s+/)[0] ?? "";
    return commands.filter(
      (cmd) =>
        cmd.command.slice(1).startsWith(verb) || `${cmd.label} ${cmd.description}`.toLowerCase().includes(q)
    );
  }, [commands, query]);

  useEffect(() => setSelected(0), [query]);

  useInput((input, key) => {
    if (!isOpen) return;
    if (key.escape) {
      setQuery("");
      return onClose();
    }
    if (key.upArrow) return setSelected((prev) => (prev <= 0 ? Math.max(filtered.length - 1, 0) : prev - 1));
    if (key.downArrow) return setSelected((prev) => (filtered.length === 0 ? 0 : (prev + 1) % filtered.length));

    if (key.tab) {
      const selectedCmd = filtered[selected];
      if (selectedCmd) setQuery(commandStem(selectedCmd.command));
      return;
    }

    if (key.return) {
      const selectedCmd = filtered[selected];
      const typed = query.trim();
      const text = typed.length > 0 ? typed : selectedCmd ? commandStem(selectedCmd.command).trim() : "";
      if (text) onExecute(text.startsWith("/") ? text : `/${text}`);
      setQuery("");
      onClose();
      return;
    }

    if (key.backspace || key.delete) return setQuery((prev) => prev.slice(0, -1));

    if (input && !key.ctrl && !key.meta) {
      if (query.length === 0 && (input === "/" || input === "\\")) return;
      setQuery((prev) => prev + input);
    }
  });

  if (!isOpen) return null;

  return (
    <Box borderStyle="round" borderColor="cyan" flexDirection="column" paddingX={1} marginTop={1}>
      <Text color="cyan">Commands</Text>
      <Text>/ {query || "<type a command>"}</Text>
      <Box flexDirection="column" marginTop={1}>
        {filtered.map((cmd, index) => {
          const active = index === selected;
          return (
            <Text key={cmd.id} color={active ? "green" : "white"}>
              {active ? ">" : " "} {cmd.command.padEnd(22)} {cmd.description}
            </Text>
          );
        })}
        {filtered.length === 0 ? <Text color="gray">No matching command</Text> : null}
      </Box>
      <Text color="gray">Esc close | Arrows select | Tab complete | Enter run</Text>
    </Box>
  );
}
