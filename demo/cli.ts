// Sends one prompt through a running proxy and prints reasoning and answer as they stream in
import { streamChat } from '../clients/ts/index.js';

const prompt = process.argv.slice(2).join(' ') || 'Why is the sky blue? Answer in two sentences.';
const url = process.env.PROXY_URL ?? 'http://localhost:8000/v1/chat/completions';
const model = process.env.MODEL_ID ?? 'hf:deepseek-ai/DeepSeek-R1';
const apiKey = process.env.UPSTREAM_API_KEY;

let section: 'reasoning' | 'content' | null = null;

try {
  await streamChat({
    url,
    headers: apiKey ? { Authorization: `Bearer ${apiKey}` } : {},
    body: { model, messages: [{ role: 'user', content: prompt }] },
    onDelta(d) {
      if (d.reasoning) {
        if (section !== 'reasoning') process.stdout.write('\n--- reasoning ---\n');
        section = 'reasoning';
        process.stdout.write(d.reasoning);
      }
      if (d.content) {
        if (section !== 'content') process.stdout.write('\n--- answer ---\n');
        section = 'content';
        process.stdout.write(d.content);
      }
    },
  });
  process.stdout.write('\n');
} catch (err) {
  console.error('Stream error', err);
  process.exit(1);
}
