import { SimpleEventBus } from '../../src/adapters/sys/SimpleEventBus';
import { defineTool, FunctionToolRegistry } from '../../src/adapters/tools/FunctionToolRegistry';
import { AgentLoop } from '../../src/app/AgentLoop';
import { ChatConsole } from '../../src/app/ChatConsole';
import type { ConsoleIO } from '../../src/app/ChatConsole';
import { ConversationSession } from '../../src/app/ConversationSession';
import type { LlmPort } from '../../src/app/LlmPort';
import { ToolInvoker } from '../../src/app/ToolInvoker';
import { MathCalculatorTool } from '../../src/features/MathCalculatorTool';
import type { ModelDecision } from '../../src/shared/contracts';
import { fakeLogger, final, fixedClock, scriptedLlm, toolCalls } from '../helpers/fakes';

function scriptedIO(lines: string[]) {
  const remaining = [...lines];
  const output: string[] = [];
  const io: ConsoleIO = {
    ask: async () => remaining.shift() ?? null,
    write: (line) => {
      output.push(line);
    },
  };
  return { io, output };
}

function makeConsole(llm: LlmPort, io: ConsoleIO, debugTools = false) {
  const logger = fakeLogger();
  const bus = new SimpleEventBus(logger);
  const invoker = new ToolInvoker(new FunctionToolRegistry([defineTool(new MathCalculatorTool())]), logger);
  const loop = new AgentLoop(llm, invoker, bus, logger);
  const session = new ConversationSession(loop, null, fixedClock(0), logger, {
    systemPrompt: 'test',
    userId: 'u',
  });
  return new ChatConsole(session, io, bus, { debugTools });
}

describe('ChatConsole', () => {
  test('interactive mode prints answers and stops on exit', async () => {
    const { io, output } = scriptedIO(['hello', '', 'exit', 'never read']);
    const chat = makeConsole(scriptedLlm([final('Hi!')]), io);

    await chat.runInteractive();

    expect(output.slice(2)).toEqual(['Agent: Hi!', 'Goodbye! We talked for 1 turn.']);
  });

  test('interactive mode stops when input ends', async () => {
    const { io, output } = scriptedIO([]);
    const chat = makeConsole(scriptedLlm([]), io);
    await chat.runInteractive();
    expect(output[output.length - 1]).toBe('Goodbye!');
  });

  test('debug mode prints tool activity', async () => {
    const { io, output } = scriptedIO(['sum please', 'quit']);
    const llm = scriptedLlm([
      toolCalls({ id: 'c1', name: 'math_calculator', args: { expression: '2 + 2' } }),
      final('4'),
    ]);
    const chat = makeConsole(llm, io, true);

    await chat.runInteractive();

    expect(output.slice(2, 5)).toEqual([
      '[tool] math_calculator {"expression":"2 + 2"}',
      '[tool] math_calculator -> Result: 4',
      'Agent: 4',
    ]);
  });

  test('examples mode runs every query and keeps going after a failure', async () => {
    const { io, output } = scriptedIO([]);
    const chat = makeConsole(scriptedLlm([final('first'), new Error('boom'), final('third')]), io);

    const failures = await chat.runExamples(['q1', 'q2', 'q3']);

    expect(failures).toBe(1);
    expect(output).toEqual([
      '\nExample 1: q1',
      'Agent: first',
      '\nExample 2: q2',
      'Agent: I could not complete that request because the model service failed.',
      '\nExample 3: q3',
      'Agent: third',
    ]);
  });

  test('cancel aborts the turn in flight', async () => {
    let chat: ChatConsole | undefined;
    const llm = {
      decide: jest.fn(
        async (
          _conversation: unknown,
          _tools: unknown,
          options?: { signal?: AbortSignal }
        ): Promise<ModelDecision> => {
          expect(chat?.cancel()).toBe(true);
          expect(options?.signal?.aborted).toBe(true);
          throw new Error('aborted');
        }
      ),
    };
    const { io, output } = scriptedIO([]);
    chat = makeConsole(llm, io);

    await chat.runExamples(['slow question']);

    expect(output[1]).toBe('Agent: I could not complete that request because it was cancelled.');
    expect(chat.cancel()).toBe(false);
  });
});
