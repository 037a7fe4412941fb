import http from 'http';
import { OllamaConnector } from '../ollama';
import { ConnectionError, ModelError, TimeoutError } from '../../errors';
import { readBody, startServer, TestServer, unusedPort } from '../../__tests__/helpers/server';
import { waitFor } from '../../__tests__/helpers/fakes';

type Handler = (req: http.IncomingMessage, res: http.ServerResponse, body: unknown) => void;

function ndjson(...lines: object[]): string {
  return lines.map((line) => JSON.stringify(line)).join('\n') + '\n';
}

describe('OllamaConnector', () => {
  let server: TestServer;
  let handler: Handler;
  let received: unknown[];

  beforeEach(async () => {
    received = [];
    handler = (_req, res) => res.end();
    server = await startServer((req, res) => {
      readBody(req)
        .then((body) => {
          received.push(body);
          handler(req, res, body);
        })
        .catch(() => res.destroy());
    });
  });

  afterEach(async () => {
    await server.close();
  });

  function connector(overrides: { timeoutSeconds?: number; options?: Record<string, number> } = {}) {
    return new OllamaConnector({
      baseUrl: server.url,
      defaultModel: 'llama3',
      timeoutSeconds: overrides.timeoutSeconds ?? 5,
      options: overrides.options,
    });
  }

  describe('generate without streaming', () => {
    it('returns the whole response text', async () => {
      handler = (req, res) => {
        expect(req.method).toBe('POST');
        expect(req.url).toBe('/api/generate');
        res.setHeader('Content-Type', 'application/json');
        res.end(JSON.stringify({ model: 'llama3', response: 'Paris is the capital.', done: true }));
      };

      await expect(connector().generate({ prompt: 'Capital of France?' })).resolves.toBe('Paris is the capital.');
      expect(received).toEqual([{ model: 'llama3', prompt: 'Capital of France?', stream: false }]);
    });

    it('merges configured and per-request options', async () => {
      handler = (_req, res) => res.end(JSON.stringify({ response: 'ok' }));

      await connector({ options: { temperature: 0.2, top_k: 40 } }).generate({
        model: 'mistral',
        prompt: 'hi',
        options: { temperature: 0.7 },
      });
      expect(received).toEqual([
        { model: 'mistral', prompt: 'hi', stream: false, options: { temperature: 0.7, top_k: 40 } },
      ]);
    });

    it('reports a missing model as ModelError', async () => {
      handler = (_req, res) => {
        res.statusCode = 404;
        res.end(JSON.stringify({ error: "model 'nope' not found" }));
      };

      const result = connector().generate({ model: 'nope', prompt: 'hi' });
      await expect(result).rejects.toBeInstanceOf(ModelError);
      await expect(connector().generate({ model: 'nope', prompt: 'hi' })).rejects.toThrow(
        `Model "nope" is not available on ${server.url}`
      );
    });

    it('reports other HTTP failures with the status', async () => {
      handler = (_req, res) => {
        res.statusCode = 500;
        res.end('{}');
      };

      await expect(connector().generate({ prompt: 'hi' })).rejects.toThrow(
        `The model server at ${server.url} returned HTTP 500`
      );
    });

    it('reports an unexpected body as ModelError', async () => {
      handler = (_req, res) => res.end(JSON.stringify({ text: 'wrong field' }));

      await expect(connector().generate({ prompt: 'hi' })).rejects.toThrow(
        `Unexpected response from the model server at ${server.url}`
      );
    });

    it('times out when the server does not answer', async () => {
      handler = () => undefined;

      const result = connector({ timeoutSeconds: 0.2 }).generate({ prompt: 'hi' });
      await expect(result).rejects.toBeInstanceOf(TimeoutError);
      await expect(connector({ timeoutSeconds: 0.2 }).generate({ prompt: 'hi' })).rejects.toThrow(
        `The model server at ${server.url} did not respond within 0.2s`
      );
    });
  });

  describe('generate with streaming', () => {
    it('yields each fragment until the end marker', async () => {
      handler = (_req, res) => {
        res.setHeader('Content-Type', 'application/x-ndjson');
        res.write(ndjson({ response: 'Hel', done: false }));
        setTimeout(() => {
          res.end(ndjson({ response: 'lo', done: false }, { response: '', done: true }));
        }, 20);
      };

      const stream = await connector().generate({ prompt: 'greet', stream: true });
      const fragments: string[] = [];
      for await (const fragment of stream) fragments.push(fragment);

      expect(fragments).toEqual(['Hel', 'lo']);
      expect(received).toEqual([{ model: 'llama3', prompt: 'greet', stream: true }]);
    });

    it('produces the same text as a request without streaming', async () => {
      const answer = ['Robots ', 'carry ', 'up to ', '500 kg', '.'];
      handler = (_req, res, body) => {
        const streaming = typeof body === 'object' && body !== null && 'stream' in body && body.stream === true;
        if (!streaming) {
          res.end(JSON.stringify({ response: answer.join(''), done: true }));
          return;
        }
        res.setHeader('Content-Type', 'application/x-ndjson');
        res.end(ndjson(...answer.map((response) => ({ response, done: false })), { response: '', done: true }));
      };

      const whole = await connector().generate({ prompt: 'Payload?' });
      const streamed = await (await connector().generate({ prompt: 'Payload?', stream: true })).collect();

      expect(whole).toBe('Robots carry up to 500 kg.');
      expect(streamed).toBe(whole);
      expect(received).toEqual([
        { model: 'llama3', prompt: 'Payload?', stream: false },
        { model: 'llama3', prompt: 'Payload?', stream: true },
      ]);
    });

    it('fails when the body ends before the end marker', async () => {
      handler = (_req, res) => res.end(ndjson({ response: 'partial', done: false }));

      const stream = await connector().generate({ prompt: 'greet', stream: true });
      const result = stream.collect();
      await expect(result).rejects.toBeInstanceOf(ConnectionError);
      await expect(result).rejects.toThrow(`The model server at ${server.url} closed the stream before it finished`);
    });

    it('raises ModelError for an error line', async () => {
      handler = (_req, res) => res.end(ndjson({ response: 'a', done: false }, { error: 'model runner crashed' }));

      const stream = await connector().generate({ prompt: 'greet', stream: true });
      await expect(stream.collect()).rejects.toThrow('model runner crashed');
    });

    it('reports a missing model before any fragment', async () => {
      handler = (_req, res) => {
        res.statusCode = 404;
        res.end(JSON.stringify({ error: 'not found' }));
      };

      await expect(connector().generate({ model: 'ghost', prompt: 'hi', stream: true })).rejects.toThrow(
        `Model "ghost" is not available on ${server.url}`
      );
    });

    it('closes the connection when cancelled', async () => {
      let closed = false;
      handler = (_req, res) => {
        res.on('close', () => { closed = true; });
        res.write(ndjson({ response: 'first', done: false }));
      };

      const stream = await connector().generate({ prompt: 'long', stream: true });
      const fragments: string[] = [];
      for await (const fragment of stream) {
        fragments.push(fragment);
        stream.cancel();
      }

      expect(fragments).toEqual(['first']);
      expect(stream.isCancelled).toBe(true);
      await waitFor(() => closed);
    });

    it('stops when the caller aborts its signal', async () => {
      handler = (_req, res) => res.write(ndjson({ response: 'first', done: false }));
      const controller = new AbortController();

      const stream = await connector().generate({ prompt: 'long', stream: true, signal: controller.signal });
      const fragments: string[] = [];
      for await (const fragment of stream) {
        fragments.push(fragment);
        controller.abort();
      }
      expect(fragments).toEqual(['first']);
    });
  });

  describe('listModels', () => {
    it('maps the installed models', async () => {
      handler = (req, res) => {
        expect(req.url).toBe('/api/tags');
        res.end(JSON.stringify({
          models: [
            { name: 'llama3:latest', size: 4661224676, modified_at: '2024-05-01T10:00:00Z' },
            { name: 'mistral:7b' },
          ],
        }));
      };

      await expect(connector().listModels()).resolves.toEqual([
        { name: 'llama3:latest', size: 4661224676, modifiedAt: '2024-05-01T10:00:00Z' },
        { name: 'mistral:7b', size: undefined, modifiedAt: undefined },
      ]);
    });
  });

  it('reports an unreachable server as ConnectionError', async () => {
    const port = await unusedPort();
    const offline = new OllamaConnector({ baseUrl: `http://127.0.0.1:${port}`, defaultModel: 'llama3', timeoutSeconds: 5 });

    const result = offline.generate({ prompt: 'hi' });
    await expect(result).rejects.toBeInstanceOf(ConnectionError);
    await expect(offline.listModels()).rejects.toThrow(`Could not reach the model server at http://127.0.0.1:${port}`);
    expect(offline.endpoint).toBe(`http://127.0.0.1:${port}`);
  });
});
