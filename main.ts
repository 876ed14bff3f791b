import dotenv from 'dotenv';
import path from 'node:path';
import { loadConfig } from './config.ts';
import { toErrorMessage } from './errors.ts';
import { createConsoleLogger } from './logger.ts';
import { SIMULATED_DEVICE_ID, SimulatedEcgTransport } from './services/ecgSimulator.ts';
import { createSummaryGateway } from './services/geminiService.ts';
import { SessionCoordinator } from './services/sessionCoordinator.ts';
import { writeSessionCsv } from './services/sessionExport.ts';
import { buildSessionStatistics, overallAssessment } from './services/sessionStatistics.ts';
import { JsonFileSessionStore } from './services/sessionStore.ts';
import { RecordingState, type Session } from './types.ts';

const main = async () => {
  dotenv.config();
  const config = loadConfig();
  const logger = createConsoleLogger(config.logLevel);

  const requested = process.argv[2] ? Number(process.argv[2]) : undefined;
  const store = new JsonFileSessionStore(path.resolve(config.sessionStorePath));
  const transport = new SimulatedEcgTransport(logger.child('simulator'), {
    sampleRateHz: config.recording.sampleRateHz,
  });
  const coordinator = new SessionCoordinator({
    transport,
    store,
    config: config.recording,
    userId: config.userId,
    logger: logger.child('session'),
  });

  let lastStatus = '';
  const finished = new Promise<Session>((resolve, reject) => {
    coordinator.subscribe((notice) => {
      if (notice.type === 'stateChanged' && notice.state.statusMessage !== lastStatus) {
        lastStatus = notice.state.statusMessage;
        const bpm = notice.state.currentHeartRate > 0 ? ` (${notice.state.currentHeartRate} bpm)` : '';
        logger.info(`${lastStatus}${bpm}`);
      }
      if (notice.type === 'sessionCompleted') resolve(notice.session);
      if (notice.type === 'sessionAborted') reject(notice.reason);
    });
  });

  try {
    await coordinator.scan();
    await coordinator.connect(SIMULATED_DEVICE_ID);
    coordinator.start(requested);

    const session = await finished;
    await coordinator.flush();

    const csv = await writeSessionCsv(session, path.dirname(path.resolve(config.sessionStorePath)));
    logger.info(`Session ${session.id}: ${session.sampleCount} samples, ${session.heartRate.average} bpm average`);
    logger.info(`Assessment: ${overallAssessment(session.heartRate.average)} (${session.rhythm})`);
    if (session.signalQuality) {
      logger.info(`Signal quality: ${session.signalQuality.score}/100 (SNR ${session.signalQuality.snrDb} dB)`);
    }
    if (session.heartRateVariability) {
      const { sdnnMs, rmssdMs } = session.heartRateVariability;
      logger.info(`HRV: SDNN ${sdnnMs} ms, RMSSD ${rmssdMs} ms`);
    }
    logger.info(`CSV written to ${csv}`);

    const statistics = buildSessionStatistics(await store.listSessions(config.userId));
    const summary = await createSummaryGateway(config.ai, logger.child('ai')).summarize(statistics, 'en');
    console.log(`\n${summary.summary}\n\n${summary.observations}\n`);
    summary.suggestions.forEach((suggestion, i) => console.log(`${i + 1}. ${suggestion}`));
  } finally {
    if (coordinator.getState().recording === RecordingState.COMPLETED) coordinator.reset();
    await coordinator.disconnect();
    coordinator.dispose();
  }
};

main().catch((error: unknown) => {
  console.error(`ECG session failed: ${toErrorMessage(error)}`);
  process.exitCode = 1;
});
