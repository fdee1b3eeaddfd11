import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../src/config.js';
import { parseDateResult } from '../src/tools/parse-date.js';

const config = loadConfig();

export default function handler(req: VercelRequest, res: VercelResponse) {
  const raw = req.query.date;
  const date = Array.isArray(raw) ? raw[0] : raw;

  if (date === undefined) {
    res.status(400).json({ error: 'Missing "date" query parameter' });
    return;
  }

  res.status(200).json(parseDateResult({ date }, config));
}
