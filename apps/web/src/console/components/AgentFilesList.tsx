import { Box, Button, Flex, Heading, Text } from "@radix-ui/themes";
import { TrashIcon } from "@radix-ui/react-icons";
import type { AgentFile } from "@foundry-console/types";
import { Notice } from "./Notice";

export function formatFileRow(file: AgentFile): string {
  return `${file.filename} (id=${file.fileId}, bytes=${file.bytes ?? "unknown"})`;
}

interface AgentFilesListProps {
  files: readonly AgentFile[];
  isLoading: boolean;
  /** Listing failure, shown as a warning in place of the rows. */
  errorMessage?: string;
  deletingFileId?: string;
  onDelete: (file: AgentFile) => void;
}

export function AgentFilesList({
  files,
  isLoading,
  errorMessage,
  deletingFileId,
  onDelete,
}: AgentFilesListProps): JSX.Element {
  let body: JSX.Element;
  if (errorMessage) {
    body = <Notice tone="warning" message={`Could not list CI files: ${errorMessage}`} />;
  } else if (isLoading) {
    body = (
      <Text size="2" color="gray">
        Loading files…
      </Text>
    );
  } else if (files.length === 0) {
    body = <Notice tone="info" message="No files attached to Code Interpreter for this agent." />;
  } else {
    body = (
      <Flex asChild direction="column" gap="2">
        <ul aria-label="Code Interpreter files">
          {files.map((file, index) => (
            <Flex asChild key={`${file.fileId}-${index}`} align="center" justify="between" gap="2">
              <li>
                <Text size="2" color={file.available ? undefined : "gray"}>
                  {formatFileRow(file)}
                </Text>
                <Button
                  size="1"
                  color="red"
                  variant="soft"
                  aria-label={`Delete ${file.filename}`}
                  disabled={deletingFileId !== undefined}
                  loading={deletingFileId === file.fileId}
                  onClick={() => onDelete(file)}
                >
                  <TrashIcon />
                  Delete
                </Button>
              </li>
            </Flex>
          ))}
        </ul>
      </Flex>
    );
  }

  return (
    <Box>
      <Heading as="h3" size="3" mb="2">
        Files in Code Interpreter
      </Heading>
      {body}
    </Box>
  );
}
