import { Type } from '@google/genai';
import type { ModelClient } from '../../clients/genai-client.js';
import { readString } from '../args.js';
import { TROUBLESHOOT_SEARCH_INSTRUCTION } from '../prompts.js';
import type { AgentTool } from '../types.js';

export interface TroubleshootToolDeps {
  model: ModelClient;
  modelName: string;
  fileSearchStore?: string;
}

export function createTroubleshootTools(deps: TroubleshootToolDeps): AgentTool[] {
  const getTroubleshootingHelp: AgentTool = {
    declaration: {
      name: 'get_troubleshooting_help',
      description: 'Search the appliance service manuals for diagnosis and repair guidance.',
      parameters: {
        type: Type.OBJECT,
        properties: {
          query: {
            type: Type.STRING,
            description: 'Appliance type, brand, model number and the symptom or error code.',
          },
        },
        required: ['query'],
      },
    },
    async execute(args) {
      if (!deps.fileSearchStore) {
        return { status: 'error', message: 'Unable to find the file search store.' };
      }
      const answer = await deps.model.searchDocuments({
        model: deps.modelName,
        query: readString(args, 'query'),
        fileSearchStore: deps.fileSearchStore,
        systemInstruction: TROUBLESHOOT_SEARCH_INSTRUCTION,
      });
      return { status: 'success', troubleshooting_steps: answer };
    },
  };

  return [getTroubleshootingHelp];
}
