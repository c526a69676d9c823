/**
 * Static server documentation exposed as MCP resources.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { SERVER_DESCRIPTION, SERVER_NAME, SERVER_VERSION } from '../constants.js';

export const SERVER_INFO_URI = 'server://info';

export interface ServerInfoSettings {
  maxSessions: number;
  sessionTimeoutMs: number;
  casesDir: string;
  maxResultPoints: number;
  defaultTdsTf: number;
}

export function renderServerInfo(settings: ServerInfoSettings): string {
  return `# ${SERVER_NAME} v${SERVER_VERSION}

${SERVER_DESCRIPTION}.

## Tools

| Tool | Purpose |
|---|---|
| list_available_cases | Case files in the cases directory |
| load_case | Load a case into a new session |
| get_system_info | Component counts and DAE sizes |
| list_sessions | Live sessions |
| close_session | Release a session |
| run_power_flow | Steady-state solution |
| run_time_domain | Time-domain simulation (needs a converged power flow) |
| run_eigenvalue | Small-signal analysis (needs a converged power flow) |
| get_pflow_results | Current power flow solution |
| get_tds_results | Trajectories, downsampled above max_points |
| list_tds_variables | Variable names for get_tds_results |

## Typical workflow

1. \`load_case\` with a path from \`list_available_cases\`
2. \`run_power_flow\`
3. \`run_time_domain\` (default tf ${settings.defaultTdsTf} s) or \`run_eigenvalue\`
4. \`list_tds_variables\`, then \`get_tds_results\`
5. \`close_session\`

## Configuration

- Max sessions: ${settings.maxSessions} (least recently used is evicted beyond this)
- Session timeout: ${Math.round(settings.sessionTimeoutMs / 1000)} s idle
- Max result points: ${settings.maxResultPoints}
- Cases directory: ${settings.casesDir}
`;
}

export function registerServerResources(server: McpServer, settings: ServerInfoSettings): void {
  server.registerResource(
    'server-info',
    SERVER_INFO_URI,
    {
      title: 'Server Info',
      description: 'Tools, typical workflow and active limits of this server',
      mimeType: 'text/markdown'
    },
    async (uri: URL): Promise<ReadResourceResult> => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'text/markdown',
          text: renderServerInfo(settings)
        }
      ]
    })
  );
}
