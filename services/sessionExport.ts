import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Session } from '../types.ts';

export const toCsv = (session: Session): string => {
  const headers = 'Time(ms),Voltage(mV)\n';
  const stepMs = 1000 / session.sampleRateHz;
  const rows = session.samples.map((voltage, i) => `${Math.round(i * stepMs)},${voltage.toFixed(4)}`).join('\n');
  return headers + rows;
};

export const writeSessionCsv = async (session: Session, directory: string): Promise<string> => {
  const file = path.join(directory, `ecg_session_${session.startedAt}.csv`);
  await writeFile(file, toCsv(session), 'utf-8');
  return file;
};
