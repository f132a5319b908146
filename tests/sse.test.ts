/**
 * Tests for the SSE stream decoder
 */

import { decodeSSEStream, processSSELine, DecoderState } from '../src/infrastructure/http/SSEDecoder.js';
import { CancellationError, TransportError } from '../src/core/errors.js';

async function* chunks(...parts: Array<string | Uint8Array>): AsyncGenerator<string | Uint8Array> {
  for (const part of parts) {
    yield part;
  }
}

async function* failingAfter(parts: string[], failure: Error): AsyncGenerator<string> {
  for (const part of parts) {
    yield part;
  }
  throw failure;
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

function textChunk(text: string, finishReason?: string): string {
  const choice = finishReason === undefined ? { text } : { text, finish_reason: finishReason };
  return `data: ${JSON.stringify({ choices: [choice] })}\n`;
}

describe('decodeSSEStream', () => {
  it('should deliver increments in order and fire the terminal callback', async () => {
    const onToken = jest.fn();

    const result = await decodeSSEStream(
      chunks(textChunk('Hel'), textChunk('lo', 'stop'), 'data: [DONE]\n'),
      onToken
    );

    expect(result).toEqual({ text: 'Hello', stopReason: 'stop', completed: true });
    expect(onToken.mock.calls).toEqual([
      ['Hel', false],
      ['lo', false],
      ['', true],
    ]);
  });

  it('should skip comments, event lines and blank keep-alives', async () => {
    const result = await decodeSSEStream(
      chunks(': keep-alive\n\nevent: message\n', textChunk('x'), '\ndata: [DONE]\n\n')
    );

    expect(result.text).toBe('x');
    expect(result.completed).toBe(true);
  });

  it('should skip malformed chunks and keep reading', async () => {
    const onToken = jest.fn();

    const result = await decodeSSEStream(
      chunks('data: {not json}\n', 'data: {"choices":"nope"}\n', textChunk('ok'), 'data: [DONE]\n'),
      onToken
    );

    expect(result.text).toBe('ok');
    expect(onToken).toHaveBeenCalledTimes(2);
  });

  it('should skip chunks without choices', async () => {
    const result = await decodeSSEStream(
      chunks('data: {"choices":[]}\n', textChunk('a'), 'data: [DONE]\n')
    );

    expect(result.text).toBe('a');
  });

  it('should accept data lines without a space after the colon', async () => {
    const result = await decodeSSEStream(chunks('data:{"choices":[{"text":"tight"}]}\n', 'data:[DONE]\n'));

    expect(result.text).toBe('tight');
    expect(result.completed).toBe(true);
  });

  it('should let the last non-empty finish_reason win', async () => {
    const result = await decodeSSEStream(
      chunks(
        textChunk('a', 'length'),
        'data: {"choices":[{"text":"b","finish_reason":null}]}\n',
        'data: [DONE]\n'
      )
    );

    expect(result.stopReason).toBe('length');
    expect(result.text).toBe('ab');
  });

  it('should overwrite an earlier finish_reason with a later one', async () => {
    const result = await decodeSSEStream(
      chunks(textChunk('a', 'length'), textChunk('b', 'stop'), 'data: [DONE]\n')
    );

    expect(result.stopReason).toBe('stop');
  });

  it('should record usage from a trailing usage chunk', async () => {
    const result = await decodeSSEStream(
      chunks(
        textChunk('Hi', 'stop'),
        'data: {"choices":[],"usage":{"prompt_tokens":12,"completion_tokens":3,"total_tokens":15}}\n',
        'data: [DONE]\n'
      )
    );

    expect(result.usage).toEqual({ inputTokens: 12, outputTokens: 3 });
  });

  it('should reassemble lines split across chunks', async () => {
    const result = await decodeSSEStream(
      chunks('data: {"choices":[{"te', 'xt":"Hi"}]}\nda', 'ta: [DONE]\n')
    );

    expect(result.text).toBe('Hi');
    expect(result.completed).toBe(true);
  });

  it('should decode multi-byte characters split across byte chunks', async () => {
    const bytes = Buffer.from('data: {"choices":[{"text":"é"}]}\ndata: [DONE]\n');
    const cut = bytes.indexOf(0xc3) + 1;

    const result = await decodeSSEStream(
      chunks(bytes.subarray(0, cut), bytes.subarray(cut))
    );

    expect(result.text).toBe('é');
  });

  it('should handle CRLF line endings', async () => {
    const result = await decodeSSEStream(
      chunks('data: {"choices":[{"text":"a"}]}\r\ndata: [DONE]\r\n')
    );

    expect(result.text).toBe('a');
    expect(result.completed).toBe(true);
  });

  it('should process a final line without a trailing newline', async () => {
    const onToken = jest.fn();

    const result = await decodeSSEStream(chunks(textChunk('end'), 'data: [DONE]'), onToken);

    expect(result.completed).toBe(true);
    expect(onToken).toHaveBeenLastCalledWith('', true);
  });

  it('should stop reading once the sentinel arrives', async () => {
    let pulledAfterDone = false;
    async function* source(): AsyncGenerator<string> {
      yield 'data: [DONE]\n';
      pulledAfterDone = true;
      yield textChunk('late');
    }

    const result = await decodeSSEStream(source());

    expect(result.text).toBe('');
    expect(pulledAfterDone).toBe(false);
  });

  it('should report an incomplete stream that ends without the sentinel', async () => {
    const onToken = jest.fn();

    const result = await decodeSSEStream(chunks(textChunk('partial', 'length')), onToken);

    expect(result).toEqual({ text: 'partial', stopReason: 'length', completed: false });
    expect(onToken).not.toHaveBeenCalledWith('', true);
  });

  it('should raise a stream transport error carrying the partial reply', async () => {
    const error = await captureError(
      decodeSSEStream(failingAfter([textChunk('Hel')], new Error('socket hang up')))
    );

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      kind: 'stream',
      partialReply: 'Hel',
      message: 'Error reading stream: socket hang up',
    });
  });

  it('should raise a cancellation when the source aborts', async () => {
    const abort = Object.assign(new Error('The operation was aborted'), { name: 'AbortError' });

    const error = await captureError(decodeSSEStream(failingAfter([textChunk('Hel')], abort)));

    expect(error).toBeInstanceOf(CancellationError);
    expect(error).toMatchObject({ partialReply: 'Hel' });
  });

  it('should stop with a cancellation when the signal fires mid-stream', async () => {
    const controller = new AbortController();
    const onToken = jest.fn(() => controller.abort());

    const error = await captureError(
      decodeSSEStream(
        chunks(textChunk('Hel'), textChunk('lo'), 'data: [DONE]\n'),
        onToken,
        controller.signal
      )
    );

    expect(error).toBeInstanceOf(CancellationError);
    expect(error).toMatchObject({ partialReply: 'Hel' });
    expect(onToken).toHaveBeenCalledTimes(1);
  });
});

describe('processSSELine', () => {
  it('should ignore lines that are not data lines', () => {
    const state: DecoderState = { text: '', stopReason: '' };

    expect(processSSELine('id: 7', state)).toBe(false);
    expect(processSSELine('', state)).toBe(false);
    expect(state).toEqual({ text: '', stopReason: '' });
  });

  it('should not emit empty text increments', () => {
    const state: DecoderState = { text: '', stopReason: '' };
    const onToken = jest.fn();

    processSSELine('data: {"choices":[{"text":"","finish_reason":"stop"}]}', state, onToken);

    expect(onToken).not.toHaveBeenCalled();
    expect(state.stopReason).toBe('stop');
  });
});
