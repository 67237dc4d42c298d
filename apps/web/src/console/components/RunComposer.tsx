import { useState, type FormEvent } from "react";
import { Button, Flex, Text, TextArea } from "@radix-ui/themes";
import { PlayIcon } from "@radix-ui/react-icons";

interface RunComposerProps {
  isRunning: boolean;
  onSubmit: (prompt: string) => void;
}

export function RunComposer({ isRunning, onSubmit }: RunComposerProps): JSX.Element {
  const [prompt, setPrompt] = useState("");

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    onSubmit(prompt);
  };

  return (
    <form onSubmit={handleSubmit}>
      <Flex direction="column" gap="2">
        <Text as="label" size="3" weight="medium" htmlFor="orchestrator-prompt">
          Ask the orchestrator
        </Text>
        <TextArea
          id="orchestrator-prompt"
          size="3"
          rows={8}
          value={prompt}
          placeholder="Type a detailed question or instructions..."
          onChange={(event) => setPrompt(event.target.value)}
        />
        <Flex justify="end">
          <Button type="submit" size="3" loading={isRunning}>
            <PlayIcon />
            Run
          </Button>
        </Flex>
      </Flex>
    </form>
  );
}
