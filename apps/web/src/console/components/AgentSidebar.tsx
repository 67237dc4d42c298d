import { useState } from "react";
import { useMutation, useQueryClient } from "@tanstack/react-query";
import { Box, Button, Flex, Heading, Select, Separator, Text } from "@radix-ui/themes";
import { PlusIcon, ReloadIcon } from "@radix-ui/react-icons";
import {
  ALLOWED_UPLOAD_EXTENSIONS,
  isAllowedUploadFilename,
  type AgentFile,
  type UploadResult,
} from "@foundry-console/types";
import { useApi } from "@/api/api-provider";
import {
  AGENTS_QUERY_KEY,
  SESSION_QUERY_KEY,
  agentFilesQueryKey,
  describeError,
  resolveActiveAgentId,
  useAgentFilesQuery,
  useAgentsQuery,
} from "../console-queries";
import { AgentFilesList } from "./AgentFilesList";
import { NoticeList, type NoticeMessage } from "./Notice";
import { UploadForm } from "./UploadForm";

const warningNotices = (warnings: readonly string[]): NoticeMessage[] =>
  warnings.map((message): NoticeMessage => ({ tone: "warning", message }));

export function uploadSuccessMessage(result: UploadResult): string {
  return result.outcome === "replaced"
    ? `File '${result.filename}' has been overwritten in Code Interpreter.`
    : `File '${result.filename}' attached to Code Interpreter.`;
}

interface AgentSidebarProps {
  onThreadStarted: (threadId: string) => void;
}

export function AgentSidebar({ onThreadStarted }: AgentSidebarProps): JSX.Element {
  const api = useApi();
  const queryClient = useQueryClient();
  const agentsQuery = useAgentsQuery();
  const [selectedAgentId, setSelectedAgentId] = useState<string | undefined>();
  const [notices, setNotices] = useState<NoticeMessage[]>([]);

  const agents = agentsQuery.data ?? [];
  const activeAgentId = resolveActiveAgentId(agents, selectedAgentId);
  const filesQuery = useAgentFilesQuery(activeAgentId);

  const refreshSession = () => {
    void queryClient.invalidateQueries({ queryKey: SESSION_QUERY_KEY });
  };

  const storeFiles = (agentId: string, files: AgentFile[]) => {
    queryClient.setQueryData(agentFilesQueryKey(agentId), files);
  };

  const { mutate: refreshAgents, isPending: isRefreshing } = useMutation({
    mutationFn: () => api.http.agents.list({ refresh: true }),
    onSuccess: (list) => {
      queryClient.setQueryData(AGENTS_QUERY_KEY, list);
      setNotices([]);
    },
    onError: (error: unknown) => {
      setNotices([{ tone: "error", message: `Failed to list agents: ${describeError(error)}` }]);
    },
  });

  const { mutate: startThread, isPending: isStartingThread } = useMutation({
    mutationFn: () => api.http.threads.create(),
    onSuccess: ({ threadId }) => {
      setNotices([{ tone: "success", message: `Started a new thread: ${threadId}` }]);
      onThreadStarted(threadId);
      refreshSession();
    },
    onError: (error: unknown) => {
      setNotices([{ tone: "error", message: `Could not start a new thread: ${describeError(error)}` }]);
    },
  });

  const {
    mutate: deleteFile,
    isPending: isDeleting,
    variables: deleting,
  } = useMutation({
    mutationFn: ({ agentId, file }: { agentId: string; file: AgentFile }) =>
      api.http.files.delete(agentId, file.fileId),
    onSuccess: (result, { agentId, file }) => {
      storeFiles(agentId, result.files);
      setNotices([
        { tone: "success", message: `Deleted ${file.filename} from CI and project.` },
        ...warningNotices(result.warnings),
      ]);
    },
    onError: (error: unknown) => {
      setNotices([{ tone: "error", message: `Delete failed: ${describeError(error)}` }]);
    },
    onSettled: refreshSession,
  });

  const { mutate: uploadFile, isPending: isUploading } = useMutation({
    mutationFn: ({ agentId, file }: { agentId: string; file: File }) =>
      api.http.files.upload(agentId, { file, filename: file.name }),
    onSuccess: (result, { agentId }) => {
      storeFiles(agentId, result.files);
      setNotices([
        { tone: "success", message: uploadSuccessMessage(result) },
        ...warningNotices(result.warnings),
      ]);
    },
    onError: (error: unknown) => {
      setNotices([{ tone: "error", message: `Persist/overwrite failed: ${describeError(error)}` }]);
    },
    onSettled: refreshSession,
  });

  const handleUpload = (file: File) => {
    if (!activeAgentId) {
      return;
    }
    if (!isAllowedUploadFilename(file.name)) {
      setNotices([
        {
          tone: "error",
          message: `Unsupported file type for '${file.name}'. Allowed: ${ALLOWED_UPLOAD_EXTENSIONS.join(", ")}.`,
        },
      ]);
      return;
    }
    uploadFile({ agentId: activeAgentId, file });
  };

  let agentSection: JSX.Element;
  if (agentsQuery.isError) {
    agentSection = (
      <NoticeList
        notices={[{ tone: "error", message: `Failed to list agents: ${describeError(agentsQuery.error)}` }]}
      />
    );
  } else if (agentsQuery.isPending) {
    agentSection = (
      <Text size="2" color="gray">
        Loading agents…
      </Text>
    );
  } else if (agents.length === 0) {
    agentSection = <NoticeList notices={[{ tone: "error", message: "No agents found in this project." }]} />;
  } else {
    agentSection = (
      <Flex direction="column" gap="1">
        <Text size="2" weight="medium">
          Target agent
        </Text>
        <Select.Root value={activeAgentId} onValueChange={setSelectedAgentId}>
          <Select.Trigger aria-label="Target agent" />
          <Select.Content>
            {agents.map((agent) => (
              <Select.Item key={agent.id} value={agent.id}>
                {agent.label}
              </Select.Item>
            ))}
          </Select.Content>
        </Select.Root>
      </Flex>
    );
  }

  return (
    <Flex direction="column" gap="4" p="5">
      <Heading as="h2" size="4">
        Agent &amp; File Controls
      </Heading>
      <Flex gap="2" wrap="wrap">
        <Button variant="soft" loading={isRefreshing} onClick={() => refreshAgents()}>
          <ReloadIcon />
          Refresh agent list
        </Button>
        <Button variant="soft" loading={isStartingThread} onClick={() => startThread()}>
          <PlusIcon />
          New thread
        </Button>
      </Flex>
      {agentSection}
      <NoticeList notices={notices} />
      {activeAgentId ? (
        <>
          <Separator size="4" />
          <AgentFilesList
            files={filesQuery.data ?? []}
            isLoading={filesQuery.isPending}
            errorMessage={filesQuery.isError ? describeError(filesQuery.error) : undefined}
            deletingFileId={isDeleting ? deleting?.file.fileId : undefined}
            onDelete={(file) => deleteFile({ agentId: activeAgentId, file })}
          />
          <Box>
            <UploadForm disabled={isDeleting} isUploading={isUploading} onUpload={handleUpload} />
          </Box>
        </>
      ) : null}
    </Flex>
  );
}
