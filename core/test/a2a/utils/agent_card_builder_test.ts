/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {describe, expect, it} from 'vitest';

import {
  AgentCardBuilder,
  extractExamplesFromInstruction,
  replacePronouns,
} from '../../../src/a2a/utils/agent_card_builder.js';
import {CALCULATOR_AGENT_DESCRIPTOR} from '../../../src/agents/calculator_agent.js';

describe('AgentCardBuilder', () => {
  it('builds the calculator card', () => {
    const card = new AgentCardBuilder({
      agent: CALCULATOR_AGENT_DESCRIPTOR,
      rpcUrl: 'http://localhost:8002/',
    }).build();

    expect(card).toMatchObject({
      protocolVersion: '0.3.0',
      name: 'calculator_agent',
      description:
        'A simple calculator agent that can perform basic mathematical operations.',
      url: 'http://localhost:8002/',
      preferredTransport: 'JSONRPC',
      version: '0.0.1',
      capabilities: {
        streaming: false,
        pushNotifications: false,
        stateTransitionHistory: true,
      },
      defaultInputModes: ['text/plain'],
      defaultOutputModes: ['text/plain'],
      supportsAuthenticatedExtendedCard: false,
    });
    expect(card.skills.map((skill) => skill.id)).toEqual([
      'calculator_agent',
      'calculator_agent-calculate',
    ]);
  });

  it('describes the model skill in the first person with examples', () => {
    const [modelSkill] = new AgentCardBuilder({
      agent: CALCULATOR_AGENT_DESCRIPTOR,
    }).build().skills;

    expect(modelSkill.name).toBe('model');
    expect(modelSkill.tags).toEqual(['llm']);
    expect(modelSkill.description).toContain(
      'operations. I am a helpful calculator assistant.'
    );
    expect(modelSkill.examples).toEqual([
      'What is 5 + 3?',
      'Calculate 10 * 7',
      "What's 100 / 4?",
    ]);
  });

  it('adds one skill per tool', () => {
    const card = new AgentCardBuilder({
      agent: {
        name: 'helper',
        tools: [
          {name: 'lookup', description: 'Looks things up.'},
          {name: 'silent', description: ''},
        ],
      },
    }).build();

    expect(card.skills.slice(1)).toEqual([
      {
        id: 'helper-lookup',
        name: 'lookup',
        description: 'Looks things up.',
        tags: ['llm', 'tools'],
      },
      {
        id: 'helper-silent',
        name: 'silent',
        description: 'Tool: silent',
        tags: ['llm', 'tools'],
      },
    ]);
  });

  it('falls back to generated descriptions and defaults', () => {
    const card = new AgentCardBuilder({agent: {name: 'bare'}}).build();

    expect(card.description).toBe('An A2A agent: bare');
    expect(card.url).toBe('http://localhost:80/');
    expect(card.skills).toEqual([
      {id: 'bare', name: 'model', description: 'Agent bare', tags: ['llm']},
    ]);
    expect(card.provider).toBeUndefined();
    expect(card.documentationUrl).toBeUndefined();
  });

  it('includes provider, documentation and version when given', () => {
    const card = new AgentCardBuilder({
      agent: {name: 'bare'},
      provider: {organization: 'Example Org', url: 'https://example.com'},
      docUrl: 'https://example.com/docs',
      agentVersion: '2.0.0',
    }).build();

    expect(card.provider).toEqual({
      organization: 'Example Org',
      url: 'https://example.com',
    });
    expect(card.documentationUrl).toBe('https://example.com/docs');
    expect(card.version).toBe('2.0.0');
  });

  it('requires a name', () => {
    expect(() => new AgentCardBuilder({agent: {name: ''}})).toThrow(
      'Agent name cannot be empty.'
    );
  });
});

describe('replacePronouns', () => {
  it('turns the second person into the first', () => {
    expect(replacePronouns("You are kind. You're fast. Use your tools.")).toBe(
      'I am kind. I am fast. Use my tools.'
    );
  });

  it('leaves words containing "you" alone', () => {
    expect(replacePronouns('youth bayou')).toBe('youth bayou');
  });
});

describe('extractExamplesFromInstruction', () => {
  it('reads Example: lines', () => {
    expect(
      extractExamplesFromInstruction(
        'Example: "add two numbers"\nExample Query: \'divide 6 by 3\''
      )
    ).toEqual(['add two numbers', 'divide 6 by 3']);
  });

  it('returns nothing when there are no examples', () => {
    expect(extractExamplesFromInstruction('Just answer.')).toEqual([]);
  });
});
