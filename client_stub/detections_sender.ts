import fs from 'fs/promises';
import { fileURLToPath } from 'url';

// Replays a JSON file of frames (Detection[][]) to /detections at a fixed rate.
// Usage: tsx client_stub/detections_sender.ts [framesPath] [baseUrl] [intervalMs]
const framesPath = process.argv[2] ?? fileURLToPath(new URL('./fixtures/handling.json', import.meta.url));
const baseUrl = (process.argv[3] ?? 'http://localhost:8080').replace(/\/+$/, '');
const intervalMs = Number(process.argv[4] ?? 100);

async function run(path: string) {
  const frames: unknown = JSON.parse(await fs.readFile(path, 'utf8'));
  if (!Array.isArray(frames)) {
    throw new Error('frames file must hold an array of detection lists');
  }

  const list: unknown[] = frames;
  for (const [index, detections] of list.entries()) {
    const response = await fetch(`${baseUrl}/detections`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ detections })
    });
    if (!response.ok) {
      console.warn(`frame ${index} rejected`, response.status, await response.text());
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
  console.log(`sent ${list.length} frames`);
}

run(framesPath).catch((error) => {
  console.error('Sender failed', error);
  process.exit(1);
});
