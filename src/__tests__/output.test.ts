import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import { outputPathFor, writeScanOutput, type ScanEnvelope } from '../output';
import { makeConfig, makeSlot } from './fakes';

const NOW = new Date('2025-10-26T14:05:09Z');

describe('scan output', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('names files by facility, day and time', () => {
    expect(outputPathFor(makeConfig(), NOW)).toBe(path.join('output', 'btc', '2025-10-26', 'btc-140509.json'));
  });

  it('writes the envelope as JSON', () => {
    const outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'courtwatch-'));
    dirs.push(outputDir);
    const slots = { '2025-10-26': [makeSlot()] };
    const envelope: ScanEnvelope = {
      meta: {
        tool: 'courtwatch',
        version: '0.1.0',
        facility: 'btc',
        bookingUrl: 'https://www.burnabytennis.ca/app/bookings/grid',
        timestamp: NOW.toISOString(),
        durationMs: 1200,
        totalSlots: 1,
        newSlots: 1,
      },
      data: { slots, newSlots: slots },
      errors: [],
    };

    const written = writeScanOutput(makeConfig({ outputDir }), envelope, NOW);

    expect(written).toBe(path.join(outputDir, 'btc', '2025-10-26', 'btc-140509.json'));
    expect(JSON.parse(fs.readFileSync(written, 'utf-8'))).toEqual(envelope);
  });
});
