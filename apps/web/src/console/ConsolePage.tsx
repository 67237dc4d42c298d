import { useState } from "react";
import { useMutation, useQueryClient } from "@tanstack/react-query";
import { Box, Container, Flex, Heading } from "@radix-ui/themes";
import type { RunResult } from "@foundry-console/types";
import { useApi } from "@/api/api-provider";
import { SESSION_QUERY_KEY, describeError, useSessionQuery } from "./console-queries";
import { ActivityLogPanel } from "./components/ActivityLogPanel";
import { AgentSidebar } from "./components/AgentSidebar";
import { NoticeList } from "./components/Notice";
import { RunComposer } from "./components/RunComposer";
import { RunOutputPanel } from "./components/RunOutputPanel";

export function ConsolePage(): JSX.Element {
  const api = useApi();
  const queryClient = useQueryClient();
  const sessionQuery = useSessionQuery();
  const [runResult, setRunResult] = useState<RunResult | null>(null);

  const {
    mutate: submitRun,
    isPending: isRunning,
    error: runError,
    reset: resetRun,
  } = useMutation({
    mutationFn: (prompt: string) => api.http.runs.submit({ prompt }),
    onMutate: () => setRunResult(null),
    onSuccess: (result) => setRunResult(result),
    onSettled: () => {
      void queryClient.invalidateQueries({ queryKey: SESSION_QUERY_KEY });
    },
  });

  const handleThreadStarted = () => {
    setRunResult(null);
    resetRun();
  };

  return (
    <div className="console-shell">
      <aside className="console-sidebar">
        <AgentSidebar onThreadStarted={handleThreadStarted} />
      </aside>
      <Box asChild p="6">
        <main>
          <Container size="3">
            <Flex direction="column" gap="5">
              <Heading as="h1" size="6">
                AI Foundry Orchestrated Multi-Agent with File upload
              </Heading>
              <RunComposer isRunning={isRunning} onSubmit={(prompt) => submitRun(prompt)} />
              {runError ? (
                <NoticeList
                  notices={[{ tone: "error", message: `Run failed: ${describeError(runError)}` }]}
                />
              ) : null}
              {runResult ? <RunOutputPanel result={runResult} /> : null}
              <ActivityLogPanel entries={sessionQuery.data?.logs ?? []} />
            </Flex>
          </Container>
        </main>
      </Box>
    </div>
  );
}
