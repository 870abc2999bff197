import type { EngineerRepository } from '../repositories/engineer-repository.js';
import { formatAddress } from '../utils/address.js';
import { NotFoundError } from '../utils/errors.js';
import { formatDisplayDate, formatTimestamp, systemClock, type Clock } from '../utils/time.js';
import {
  ACCOUNT_AGENT_DESCRIPTION,
  ACCOUNT_AGENT_INSTRUCTION,
  NAVIGATION_AGENT_DESCRIPTION,
  NAVIGATION_AGENT_INSTRUCTION,
  ROOT_AGENT_DESCRIPTION,
  ROOT_AGENT_INSTRUCTION,
  TICKET_AGENT_DESCRIPTION,
  TICKET_AGENT_INSTRUCTION,
  TROUBLESHOOT_AGENT_DESCRIPTION,
  TROUBLESHOOT_AGENT_INSTRUCTION,
} from './prompts.js';
import type { AgentDefinition, AgentTool, ToolContext } from './types.js';

export interface EngineerAgentTools {
  account: AgentTool[];
  navigation: AgentTool[];
  tickets: AgentTool[];
  troubleshoot: AgentTool[];
}

export interface EngineerAgentOptions {
  engineers: EngineerRepository;
  tools: EngineerAgentTools;
  timezoneOffsetMinutes: number;
  clock?: Clock;
}

/**
 * Fill session state from the engineer record on the first turn.
 */
export function loadEngineerState(
  engineers: EngineerRepository,
  timezoneOffsetMinutes: number,
  clock: Clock = systemClock
): (context: ToolContext) => Promise<void> {
  return async ({ engineerId, state }) => {
    const engineer = await engineers.findById(engineerId);
    if (!engineer) {
      throw new NotFoundError(`Engineer ${engineerId} not found`);
    }
    const now = clock.now();
    state['engineer_id'] = engineer.engineerId;
    state['engineer_full_name'] = `${engineer.firstName} ${engineer.lastName}`;
    state['engineer_address'] = formatAddress(engineer);
    state['session_start_time'] = formatTimestamp(now, timezoneOffsetMinutes);
    state['current_date'] = formatDisplayDate(now, timezoneOffsetMinutes);
  };
}

export function createEngineerAgent(options: EngineerAgentOptions): AgentDefinition {
  const { tools } = options;

  return {
    name: 'engineer_agent',
    description: ROOT_AGENT_DESCRIPTION,
    instruction: ROOT_AGENT_INSTRUCTION,
    tools: [],
    beforeAgent: loadEngineerState(options.engineers, options.timezoneOffsetMinutes, options.clock),
    subAgents: [
      {
        name: 'account_management_agent',
        description: ACCOUNT_AGENT_DESCRIPTION,
        instruction: ACCOUNT_AGENT_INSTRUCTION,
        tools: tools.account,
        subAgents: [],
      },
      {
        name: 'navigation_agent',
        description: NAVIGATION_AGENT_DESCRIPTION,
        instruction: NAVIGATION_AGENT_INSTRUCTION,
        tools: tools.navigation,
        subAgents: [],
      },
      {
        name: 'ticket_management_agent',
        description: TICKET_AGENT_DESCRIPTION,
        instruction: TICKET_AGENT_INSTRUCTION,
        tools: tools.tickets,
        subAgents: [],
      },
      {
        name: 'troubleshoot_agent',
        description: TROUBLESHOOT_AGENT_DESCRIPTION,
        instruction: TROUBLESHOOT_AGENT_INSTRUCTION,
        tools: tools.troubleshoot,
        subAgents: [],
      },
    ],
  };
}
