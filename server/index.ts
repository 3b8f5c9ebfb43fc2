import 'dotenv/config';
import process from 'node:process';
import { buildMockProvider, MockMode } from './app.js';

const PORT = Number(process.env.MOCK_PORT ?? 3000);
const mode = MockMode.catch('normal').parse(process.env.MOCK_MODE);

const app = buildMockProvider({
  apiKey: process.env.MOCK_API_KEY || undefined,
  mode,
  chunkDelayMs: Number(process.env.MOCK_CHUNK_DELAY_MS ?? 40),
  logger: true,
});

app.listen({ port: PORT, host: '127.0.0.1' }).then(
  () => {
    app.log.info(`Mock chat provider running at http://localhost:${PORT} (mode: ${mode})`);
  },
  (err: unknown) => {
    app.log.error({ err }, 'failed to start mock provider');
    process.exitCode = 1;
  },
);
