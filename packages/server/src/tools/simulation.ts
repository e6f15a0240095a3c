// =============================================================================
// @reinforce-lab/server — MCP tool: simulate_policy
// =============================================================================
// Exposes the policy-gradient simulation to MCP clients with the same inputs
// and output as POST /api/rl/simulate. The result is returned as JSON text.
// =============================================================================

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  createSimulateRequestSchema,
  logToolCall,
} from "@reinforce-lab/shared";
import type { ToolRegistrar, AppDependencies } from "../server.js";
import { runSimulation } from "../simulation.js";

export const registerSimulationTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { config, logger } = deps;
  const input = createSimulateRequestSchema(config.SIM_MAX_EPISODES);

  server.tool(
    "simulate_policy",
    "Run a REINFORCE policy-gradient simulation over a token vocabulary and " +
      "return per-episode rewards and the final token distribution.",
    input.shape,
    async (request) => {
      const start = performance.now();

      try {
        const response = runSimulation(request, config);
        const durationMs = performance.now() - start;
        logToolCall(logger, "simulate_policy", request, durationMs);

        return {
          content: [{ type: "text" as const, text: JSON.stringify(response) }],
        };
      } catch (err) {
        const errorMsg = err instanceof Error ? err.message : String(err);
        logToolCall(
          logger,
          "simulate_policy",
          request,
          performance.now() - start,
          errorMsg,
        );

        return {
          content: [
            {
              type: "text" as const,
              text: `Error: Simulation failed: ${errorMsg}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
};
