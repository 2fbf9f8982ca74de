import path from 'path';
import { TreeWalker } from '../../src/tree-walker.js';
import { TextGateway, ProgressEvent } from '../../src/types.js';
import { TopicNode } from '../../../outline/src/types.js';
import { PromptBuilder } from '../../../prompts/src/prompt-builder.js';
import { loadPromptTemplates } from '../../../prompts/src/template-loader.js';
import { GenerationCache } from '../../../utils/cache-manager.js';
import { LLMCallContext } from '../../../utils/llm-client.js';
import { Ok, Err, Result, GenerationFailure } from '../../../utils/result.js';

interface GatewayCall {
  prompt: string;
  temperature: number;
  maxTokens?: number;
  nodeId?: string;
}

class ScriptedGateway implements TextGateway {
  calls: GatewayCall[] = [];
  inFlight = 0;
  peakInFlight = 0;

  constructor(
    private respond: (nodeId: string) => Result<string, GenerationFailure> = id => Ok(`Content for ${id}`),
    private delayMs = 0
  ) {}

  async generate(
    prompt: string,
    temperature: number,
    maxTokens?: number,
    context?: LLMCallContext
  ): Promise<Result<string, GenerationFailure>> {
    this.calls.push({ prompt, temperature, maxTokens, nodeId: context?.nodeId });
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    this.inFlight--;
    return this.respond(context?.nodeId ?? '');
  }

  promptFor(nodeId: string): string {
    const call = this.calls.find(c => c.nodeId === nodeId);
    if (!call) throw new Error(`no call for ${nodeId}`);
    return call.prompt;
  }
}

function node(id: string, title: string, children: TopicNode[] = []): TopicNode {
  return { id, title, description: title, children };
}

function createBuilder(): PromptBuilder {
  const loaded = loadPromptTemplates(path.resolve(__dirname, '../../../prompts/templates'));
  if (!loaded.success) throw new Error('templates failed to load');
  return new PromptBuilder(loaded.value);
}

function createWalker(gateway: TextGateway, cache = new GenerationCache()): TreeWalker {
  return new TreeWalker(createBuilder(), gateway, cache);
}

const options = { subject: 'Physics', difficulty: 'Btech' };

function sampleForest(): TopicNode[] {
  return [
    node('T1', 'Kinematics', [
      node('T1.1', 'Velocity'),
      node('T1.2', 'Acceleration', [node('T1.2.1', 'Uniform acceleration')])
    ]),
    node('T2', 'Dynamics')
  ];
}

describe('TreeWalker', () => {
  describe('lesson-plan stage', () => {
    test('should generate parents before children in document order', async () => {
      const gateway = new ScriptedGateway();

      const report = await createWalker(gateway).walk(sampleForest(), { stage: 'lesson-plan' }, options);

      expect(gateway.calls.map(c => c.nodeId)).toEqual(['T1', 'T1.1', 'T1.2', 'T1.2.1', 'T2']);
      expect(report.topics[0].content).toBe('Content for T1');
      expect(report.topics[0].children[1].children[0].content).toBe('Content for T1.2.1');
      expect(report.failures).toEqual([]);
      expect(report.visited).toBe(5);
      expect(report.total).toBe(5);
    });

    test('should give each prompt its ancestors and nothing from sibling subtrees', async () => {
      const gateway = new ScriptedGateway();

      await createWalker(gateway).walk(sampleForest(), { stage: 'lesson-plan' }, options);

      const siblingPrompt = gateway.promptFor('T1.2');
      expect(siblingPrompt).toContain('  - **T1:** Kinematics');
      expect(siblingPrompt).not.toContain('T1.1');
      expect(siblingPrompt).not.toContain('Velocity');

      const leafPrompt = gateway.promptFor('T1.2.1');
      expect(leafPrompt).toContain('  - **T1:** Kinematics\n  - **T1.2:** Acceleration');
      expect(leafPrompt).not.toContain('T1.1');

      expect(gateway.promptFor('T2')).not.toContain('Context from Parent Topics');
    });

    test('should keep going when nodes fail', async () => {
      const forest = [
        node('T1', 'Root', [
          node('T1.1', 'Left', [node('T1.1.1', 'Left A'), node('T1.1.2', 'Left B')]),
          node('T1.2', 'Right', [node('T1.2.1', 'Right A'), node('T1.2.2', 'Right B')])
        ])
      ];
      const gateway = new ScriptedGateway(id =>
        id === 'T1.1' ? Err({ code: 'E-LLM-REQUEST-FAILED', cause: 'boom' }) : Ok(`Content for ${id}`)
      );

      const report = await createWalker(gateway).walk(forest, { stage: 'lesson-plan' }, options);

      const [root] = report.topics;
      expect(root.content).toBe('Content for T1');
      expect(root.children[0].content).toBe('');
      expect(root.children[0].children.map(c => c.content)).toEqual(['Content for T1.1.1', 'Content for T1.1.2']);
      expect(root.children[1].children.map(c => c.content)).toEqual(['Content for T1.2.1', 'Content for T1.2.2']);
      expect(report.failures).toEqual([
        { code: 'E-LLM-REQUEST-FAILED', stage: 'lesson-plan', nodeId: 'T1.1', cause: 'boom' }
      ]);
      expect(report.visited).toBe(7);
    });

    test('should leave the input forest untouched', async () => {
      const forest = sampleForest();
      const before = JSON.parse(JSON.stringify(forest));

      const report = await createWalker(new ScriptedGateway()).walk(forest, { stage: 'lesson-plan' }, options);

      expect(forest).toEqual(before);
      expect(report.topics[0]).not.toBe(forest[0]);
    });

    test('should report monotonic progress ending at 1', async () => {
      const events: ProgressEvent[] = [];

      await createWalker(new ScriptedGateway()).walk(sampleForest(), { stage: 'lesson-plan' }, {
        ...options,
        onProgress: event => events.push(event)
      });

      expect(events.map(e => e.progress)).toEqual([0.2, 0.4, 0.6, 0.8, 1]);
      expect(events.map(e => e.nodeId)).toEqual(['T1.1', 'T1.2.1', 'T1.2', 'T1', 'T2']);
    });

    test('should report completion for an empty forest', async () => {
      const events: ProgressEvent[] = [];

      const report = await createWalker(new ScriptedGateway()).walk([], { stage: 'lesson-plan' }, {
        ...options,
        onProgress: event => events.push(event)
      });

      expect(report.topics).toEqual([]);
      expect(events).toEqual([{ stage: 'lesson-plan', progress: 1, visited: 0, total: 0 }]);
    });

    test('should reuse cached output for identical prompts', async () => {
      const gateway = new ScriptedGateway();
      const forest = [node('T1', 'Same'), node('T1', 'Same')];

      const report = await createWalker(gateway).walk(forest, { stage: 'lesson-plan' }, options);

      expect(gateway.calls).toHaveLength(1);
      expect(report.topics.map(t => t.content)).toEqual(['Content for T1', 'Content for T1']);
    });

    test('should convert asterisk list markers and trim output', async () => {
      const gateway = new ScriptedGateway(() => Ok('  *   point one\n*   point two  '));

      const report = await createWalker(gateway).walk([node('T1', 'A')], { stage: 'lesson-plan' }, options);

      expect(report.topics[0].content).toBe('- point one\n- point two');
    });

    test('should use template directives unless overridden', async () => {
      const gateway = new ScriptedGateway();
      const walker = createWalker(gateway);

      await walker.walk([node('T1', 'A')], { stage: 'lesson-plan' }, options);
      await walker.walk([node('T1', 'B')], { stage: 'lesson-plan' }, { ...options, temperature: 0.2, maxTokens: 50 });

      expect(gateway.calls.map(c => [c.temperature, c.maxTokens])).toEqual([[0.7, 500], [0.2, 50]]);
    });

    test('should start root nodes at the chosen detail level', async () => {
      const gateway = new ScriptedGateway();

      await createWalker(gateway).walk([node('T1', 'A', [node('T1.1', 'B')])], { stage: 'lesson-plan' }, {
        ...options,
        detailLevel: 2
      });

      expect(gateway.promptFor('T1')).toContain('Elaborate on the key concepts');
      expect(gateway.promptFor('T1.1')).toContain('Dive deep into the intricacies');
    });

    test('should run siblings concurrently when asked and keep their order', async () => {
      const gateway = new ScriptedGateway(id => Ok(`Content for ${id}`), 15);
      const forest = [node('T1', 'A'), node('T2', 'B'), node('T3', 'C'), node('T4', 'D')];

      const report = await createWalker(gateway).walk(forest, { stage: 'lesson-plan' }, {
        ...options,
        siblingConcurrency: 2
      });

      expect(gateway.peakInFlight).toBe(2);
      expect(report.topics.map(t => t.id)).toEqual(['T1', 'T2', 'T3', 'T4']);
    });

    test('should process a node object reachable twice only once', async () => {
      const gateway = new ScriptedGateway();
      const shared = node('T1', 'Shared');

      const report = await createWalker(gateway).walk([shared, shared], { stage: 'lesson-plan' }, options);

      expect(gateway.calls).toHaveLength(1);
      expect(report.topics).toHaveLength(1);
      expect(report.total).toBe(1);
      expect(report.visited).toBe(1);
    });
  });

  describe('lecture-notes stage', () => {
    function lessonPlan(): TopicNode[] {
      return [
        {
          id: 'T1',
          title: 'Kinematics',
          description: 'Kinematics',
          content: 'Plan for T1',
          children: [{ id: 'T1.1', title: 'Velocity', description: 'Velocity', content: 'Plan for T1.1', children: [] }]
        }
      ];
    }

    test('should prompt with the lesson plan content for each id', async () => {
      const gateway = new ScriptedGateway(id => Ok(`Notes for ${id}`));

      const report = await createWalker(gateway).walk(
        lessonPlan(),
        { stage: 'lecture-notes', highlightedTopics: ['Velocity'] },
        options
      );

      expect(gateway.promptFor('T1')).toContain('**Lesson Plan Context (Reference):**\nPlan for T1');
      expect(gateway.promptFor('T1.1')).toContain('**Lesson Plan Context (Reference):**\nPlan for T1.1');
      expect(gateway.promptFor('T1.1')).toContain('  - **T1:** Kinematics');
      expect(gateway.calls.map(c => c.temperature)).toEqual([0.8, 0.8]);
      expect(report.topics[0].content).toBe('Notes for T1');
      expect(report.topics[0].children[0].content).toBe('Notes for T1.1');
    });

    test('should look lesson plan content up in a separate tree when given', async () => {
      const gateway = new ScriptedGateway();
      const bare = [node('T1', 'Kinematics')];

      await createWalker(gateway).walk(
        bare,
        { stage: 'lecture-notes', highlightedTopics: [], lessonPlan: lessonPlan() },
        options
      );

      expect(gateway.promptFor('T1')).toContain('Plan for T1');
    });

    test('should process each id once and still finish progress', async () => {
      const gateway = new ScriptedGateway();
      const events: ProgressEvent[] = [];
      const forest = [node('T1', 'First'), node('T1', 'Second', [node('T1.1', 'Child')])];

      const report = await createWalker(gateway).walk(
        forest,
        { stage: 'lecture-notes', highlightedTopics: [] },
        { ...options, onProgress: event => events.push(event) }
      );

      expect(gateway.calls).toHaveLength(1);
      expect(report.topics.map(t => t.title)).toEqual(['First']);
      expect(report.skippedIds).toEqual(['T1']);
      expect(report.total).toBe(3);
      expect(events[events.length - 1].progress).toBe(1);
    });
  });
});
