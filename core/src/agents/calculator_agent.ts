/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  InMemoryArtifactService,
  InMemoryMemoryService,
  InMemorySessionService,
  LlmAgent,
  Runner,
} from '@google/adk';

import type {AgentDescriptor} from '../a2a/utils/agent_card_builder.js';
import {calculateTool} from '../tools/calculator/calculate_tool.js';

export const CALCULATOR_AGENT_NAME = 'calculator_agent';

export const CALCULATOR_AGENT_DESCRIPTION =
    'A simple calculator agent that can perform basic mathematical operations.';

export const CALCULATOR_INSTRUCTION = `
You are a helpful calculator assistant. When users ask you to perform calculations,
use the calculate tool with a mathematical expression as a string.

Examples:
- "What is 5 + 3?" -> call calculate("5 + 3")
- "Calculate 10 * 7" -> call calculate("10 * 7")
- "What's 100 / 4?" -> call calculate("100 / 4")

Always use the calculate tool for any mathematical operations. Be friendly and clear
in your responses.
`;

/** What the calculator's agent card advertises. */
export const CALCULATOR_AGENT_DESCRIPTOR: AgentDescriptor = {
  name: CALCULATOR_AGENT_NAME,
  description: CALCULATOR_AGENT_DESCRIPTION,
  instruction: CALCULATOR_INSTRUCTION,
  tools: [calculateTool],
};

export interface CalculatorAgentOptions {
  /** Model name, e.g. "gemini-2.5-flash". */
  model: string;
  /** Sampling temperature (default: 0.7). */
  temperature?: number;
}

/**
 * Builds the calculator LlmAgent with the calculate tool attached.
 */
export function createCalculatorAgent(options: CalculatorAgentOptions): LlmAgent {
  return new LlmAgent({
    name: CALCULATOR_AGENT_NAME,
    model: options.model,
    description: CALCULATOR_AGENT_DESCRIPTION,
    instruction: CALCULATOR_INSTRUCTION,
    tools: [calculateTool],
    generateContentConfig: {
      temperature: options.temperature ?? 0.7,
    },
  });
}

/**
 * Creates a runner backed by in-memory services for the given agent.
 */
export function createInMemoryRunner(agent: LlmAgent): Runner {
  return new Runner({
    appName: agent.name,
    agent,
    artifactService: new InMemoryArtifactService(),
    sessionService: new InMemorySessionService(),
    memoryService: new InMemoryMemoryService(),
  });
}
