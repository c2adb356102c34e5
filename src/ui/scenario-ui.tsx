import React, { useMemo, useState } from "react";
import { Box, Text, render } from "ink";
import SelectInput from "ink-select-input";

type SelectItem<T> = {
  key?: string;
  label: string;
  value: T;
};

export type ScenarioChoice = string | undefined;

export type ScenarioOption = {
  name: string;
  provider: string;
};

/**
 * Interactive picker for the active scenario. "None" deactivates, so every call
 * fails with a no-match error until a scenario is chosen.
 */
export const startScenarioUI = (
  scenarios: ScenarioOption[],
  current: string | undefined,
  onSelect: (scenario?: string) => void
): void => {
  const ScenarioApp = () => {
    const [selected, setSelected] = useState<string | undefined>(current);

    const items = useMemo<SelectItem<ScenarioChoice>[]>(() => {
      const none: SelectItem<ScenarioChoice> = { key: "none", label: "None (no-match for every call)", value: undefined };

      const choices = scenarios.map<SelectItem<ScenarioChoice>>((scenario) => ({
        key: scenario.name,
        label: `${scenario.name} [${scenario.provider}]`,
        value: scenario.name,
      }));
      return [none, ...choices];
    }, [scenarios]);

    return (
      <Box flexDirection="column" padding={1}>
        <Text>Mock Backend — Scenario Selector</Text>
        <SelectInput<ScenarioChoice>
          items={items}
          onSelect={(item: SelectItem<ScenarioChoice>) => {
            setSelected(item.value);
            onSelect(item.value);
          }}
          initialIndex={Math.max(
            items.findIndex((item) => item.value === selected),
            0
          )}
        />
        <Box marginTop={1}>
          <Text>Active: {selected ?? "none"}</Text>
        </Box>
      </Box>
    );
  };

  render(<ScenarioApp />);
};
