import { useState } from "react";
import { Box, Card, Flex, Heading, IconButton, Text } from "@radix-ui/themes";
import { ChevronDownIcon, ChevronRightIcon } from "@radix-ui/react-icons";
import { clsx } from "clsx";
import type { ActivityLogEntry } from "@foundry-console/types";

interface ActivityLogPanelProps {
  entries: readonly ActivityLogEntry[];
  defaultCollapsed?: boolean;
}

/** Collapsible session activity. Renders nothing until something was logged. */
export function ActivityLogPanel({
  entries,
  defaultCollapsed = true,
}: ActivityLogPanelProps): JSX.Element | null {
  const [collapsed, setCollapsed] = useState(defaultCollapsed);

  if (entries.length === 0) {
    return null;
  }

  return (
    <Card asChild>
      <section aria-label="Logs">
        <Flex align="center" justify="between" gap="3">
          <Heading as="h3" size="3">
            Logs
          </Heading>
          <IconButton
            variant="ghost"
            aria-label={collapsed ? "Expand logs" : "Collapse logs"}
            aria-expanded={!collapsed}
            onClick={() => setCollapsed((current) => !current)}
          >
            {collapsed ? <ChevronRightIcon /> : <ChevronDownIcon />}
          </IconButton>
        </Flex>
        {collapsed ? null : (
          <Box asChild mt="3">
            <ul>
              {entries.map((entry) => (
                <li
                  key={entry.id}
                  className={clsx("activity-entry", `activity-entry--${entry.level}`)}
                >
                  <Text size="2">{entry.message}</Text>
                </li>
              ))}
            </ul>
          </Box>
        )}
      </section>
    </Card>
  );
}
