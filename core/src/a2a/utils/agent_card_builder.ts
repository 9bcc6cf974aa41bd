/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Builds the A2A agent card an endpoint serves under /.well-known/.
 */

import type {
  AgentCapabilities,
  AgentCard,
  AgentProvider,
  AgentSkill,
} from '@a2a-js/sdk';

export type {AgentCapabilities, AgentCard, AgentProvider, AgentSkill};

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
}

/**
 * What the card is built from: the served agent's public face.
 */
export interface AgentDescriptor {
  name: string;
  description?: string;
  /** Plain text instruction; its second person is turned into first person. */
  instruction?: string;
  tools?: readonly ToolDescriptor[];
}

export interface AgentCardBuilderOptions {
  agent: AgentDescriptor;
  rpcUrl?: string;
  capabilities?: AgentCapabilities;
  docUrl?: string;
  provider?: AgentProvider;
  agentVersion?: string;
}

export const A2A_PROTOCOL_VERSION = '0.3.0';

export class AgentCardBuilder {
  private readonly _agent: AgentDescriptor;
  private readonly _rpcUrl: string;
  private readonly _capabilities: AgentCapabilities;
  private readonly _docUrl?: string;
  private readonly _provider?: AgentProvider;
  private readonly _agentVersion: string;

  constructor(options: AgentCardBuilderOptions) {
    if (!options.agent.name) {
      throw new Error('Agent name cannot be empty.');
    }
    this._agent = options.agent;
    this._rpcUrl = options.rpcUrl ?? 'http://localhost:80/';
    this._capabilities = options.capabilities ?? {
      streaming: false,
      pushNotifications: false,
      stateTransitionHistory: true,
    };
    this._docUrl = options.docUrl;
    this._provider = options.provider;
    this._agentVersion = options.agentVersion ?? '0.0.1';
  }

  build(): AgentCard {
    const agent = this._agent;
    const card: AgentCard = {
      protocolVersion: A2A_PROTOCOL_VERSION,
      name: agent.name,
      description: agent.description ?? `An A2A agent: ${agent.name}`,
      url: this._rpcUrl,
      preferredTransport: 'JSONRPC',
      version: this._agentVersion,
      capabilities: this._capabilities,
      skills: [buildAgentSkill(agent), ...buildToolSkills(agent)],
      defaultInputModes: ['text/plain'],
      defaultOutputModes: ['text/plain'],
      supportsAuthenticatedExtendedCard: false,
    };
    if (this._provider) card.provider = this._provider;
    if (this._docUrl) card.documentationUrl = this._docUrl;
    return card;
  }
}

function buildAgentSkill(agent: AgentDescriptor): AgentSkill {
  const parts: string[] = [];
  if (agent.description) {
    parts.push(agent.description);
  }
  if (agent.instruction) {
    parts.push(replacePronouns(agent.instruction.trim().replace(/\s+/g, ' ')));
  }
  const skill: AgentSkill = {
    id: agent.name,
    name: 'model',
    description: parts.length > 0 ? parts.join(' ') : `Agent ${agent.name}`,
    tags: ['llm'],
  };
  const examples = agent.instruction
    ? extractExamplesFromInstruction(agent.instruction)
    : [];
  if (examples.length > 0) {
    skill.examples = examples;
  }
  return skill;
}

function buildToolSkills(agent: AgentDescriptor): AgentSkill[] {
  return (agent.tools ?? []).map((tool) => ({
    id: `${agent.name}-${tool.name}`,
    name: tool.name,
    description: tool.description || `Tool: ${tool.name}`,
    tags: ['llm', 'tools'],
  }));
}

const PRONOUN_MAP: Record<string, string> = {
  'you are': 'I am',
  'you were': 'I was',
  "you're": 'I am',
  "you've": 'I have',
  yours: 'mine',
  your: 'my',
  you: 'I',
};

// Longest first so "you are" wins over "you".
const PRONOUN_PATTERN = new RegExp(
  '\\b(' +
    Object.keys(PRONOUN_MAP)
      .sort((a, b) => b.length - a.length)
      .join('|') +
    ')\\b',
  'gi'
);

/**
 * Turns an instruction addressed to the agent into a self description
 * ("You are" becomes "I am").
 */
export function replacePronouns(text: string): string {
  return text.replace(
    PRONOUN_PATTERN,
    (match) => PRONOUN_MAP[match.toLowerCase()] ?? match
  );
}

const EXAMPLE_PATTERNS = [
  /^\s*-\s*"([^"]+)"\s*->/gm,
  /Example(?: Query)?:\s*["']([^"']+)["']/gi,
];

/**
 * Collects example user inputs quoted in an instruction, either as
 * `- "input" -> ...` bullet lines or `Example: "input"`.
 */
export function extractExamplesFromInstruction(instruction: string): string[] {
  const examples: string[] = [];
  for (const pattern of EXAMPLE_PATTERNS) {
    for (const match of instruction.matchAll(pattern)) {
      if (!examples.includes(match[1])) {
        examples.push(match[1]);
      }
    }
  }
  return examples;
}
