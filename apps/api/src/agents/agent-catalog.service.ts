import { Inject, Injectable } from "@nestjs/common";
import { CONSOLE_SETTINGS } from "@foundry-console/config";
import type { ConsoleSettings } from "@foundry-console/config";
import { InjectLogger } from "@foundry-console/io";
import type { AgentSummary } from "@foundry-console/types";
import type { Logger } from "pino";
import { FoundryClient } from "../foundry/foundry.client";
import type { FoundryAgent } from "../foundry/foundry.types";

export const ORCHESTRATOR_FALLBACK_LABEL = "Orchestrator";

interface CachedAgentList {
  agents: AgentSummary[];
  expiresAt: number;
}

export function toAgentSummary(agent: FoundryAgent): AgentSummary {
  const name = agent.name?.trim();
  return { id: agent.id, label: name ? name : agent.id };
}

/**
 * Lists the project's agents behind a short TTL cache. The orchestrator is
 * always selectable even when the listing does not return it.
 */
@Injectable()
export class AgentCatalogService {
  private cached: CachedAgentList | null = null;

  constructor(
    private readonly foundry: FoundryClient,
    @Inject(CONSOLE_SETTINGS) private readonly settings: ConsoleSettings,
    @InjectLogger("agents") private readonly logger: Logger,
  ) {}

  async listAgents({ refresh = false }: { refresh?: boolean } = {}): Promise<AgentSummary[]> {
    if (refresh) {
      this.invalidate();
    }

    const now = Date.now();
    if (this.cached && this.cached.expiresAt > now) {
      return this.cloneList(this.cached.agents);
    }

    const agents = (await this.foundry.listAgents()).map(toAgentSummary);
    const orchestratorId = this.settings.orchestratorAgentId;
    if (!agents.some((agent) => agent.id === orchestratorId)) {
      agents.unshift({ id: orchestratorId, label: ORCHESTRATOR_FALLBACK_LABEL });
    }

    this.logger.debug({ count: agents.length }, "Fetched agent list");
    this.cached = {
      agents,
      expiresAt: now + this.settings.agents.listCacheTtlSeconds * 1_000,
    };
    return this.cloneList(agents);
  }

  invalidate(): void {
    this.cached = null;
  }

  private cloneList(agents: AgentSummary[]): AgentSummary[] {
    return agents.map((agent) => ({ ...agent }));
  }
}
