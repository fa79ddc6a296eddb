import fs from 'fs';
import path from 'path';
import type { AppConfig, DateSlotMap } from './types';

export interface OutputMeta {
  tool: string;
  version: string;
  facility: string;
  bookingUrl: string;
  timestamp: string;
  durationMs: number;
  totalSlots: number;
  newSlots: number;
}

export interface ScanEnvelope {
  meta: OutputMeta;
  data: {
    slots: DateSlotMap;
    newSlots: DateSlotMap;
  };
  errors: string[];
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function formatTime(date: Date): string {
  return date.toISOString().slice(11, 19).replace(/:/g, '');
}

export function outputPathFor(config: AppConfig, now: Date): string {
  const facility = config.facilityId;
  return path.join(config.outputDir, facility, formatDate(now), `${facility}-${formatTime(now)}.json`);
}

export function writeScanOutput(config: AppConfig, envelope: ScanEnvelope, now = new Date()): string {
  const outputPath = outputPathFor(config, now);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(envelope, null, 2), 'utf-8');
  return outputPath;
}
