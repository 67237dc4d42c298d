import { Box, Callout, Flex, Text } from "@radix-ui/themes";
import { ExclamationTriangleIcon, InfoCircledIcon } from "@radix-ui/react-icons";
import type { RunResult } from "@foundry-console/types";

export function RunOutputPanel({ result }: { result: RunResult }): JSX.Element {
  return (
    <Flex direction="column" gap="3">
      <Callout.Root size="1" color="blue" role="status">
        <Callout.Icon>
          <InfoCircledIcon />
        </Callout.Icon>
        <Callout.Text>Run status: {result.status}</Callout.Text>
      </Callout.Root>
      {result.output.type === "assistant" ? (
        <Box>
          <Text as="p" weight="bold" mb="1">
            Assistant:
          </Text>
          <Text as="p" className="assistant-output">
            {result.output.text}
          </Text>
        </Box>
      ) : (
        <Callout.Root size="1" color="amber" role="status">
          <Callout.Icon>
            <ExclamationTriangleIcon />
          </Callout.Icon>
          <Callout.Text>No assistant response generated.</Callout.Text>
        </Callout.Root>
      )}
    </Flex>
  );
}
