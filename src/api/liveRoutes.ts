import express, { NextFunction, Request, Response, Router } from 'express';
import multer from 'multer';
import { SessionSummary } from '../types/index.js';
import { describeError } from '../types/errors.js';
import { HistoryStore, isValidSessionId } from '../services/HistoryStore.js';
import { MockRecognitionEngine, RecognitionEngine } from '../services/MockRecognitionEngine.js';
import { UNKNOWN_SPEAKER_ID } from '../services/SpeakerAssigner.js';
import { TranscriptAggregator } from '../services/TranscriptAggregator.js';
import { JsonRecord, isRecord, readNumber, readString } from '../utils/json.js';

export interface LiveRoutesOptions {
  historyStore: HistoryStore;
  engine?: RecognitionEngine;
  speechKey?: string;
  speechRegion: string;
  tokenTtlSeconds?: number;
  clock?: () => number;
}

const MAX_CHUNK_BYTES = 25 * 1024 * 1024;
const DEFAULT_SEGMENT_SECONDS = 2.0;
const SUPPORTED_FORMATS = ['audio/wav', 'audio/webm', 'audio/ogg'];

/**
 * Build a session summary from the result rows a client collected during a
 * live session
 */
export function summaryFromLiveResults(sessionId: string, results: unknown[], now: number): SessionSummary {
  const aggregator = new TranscriptAggregator();
  results.forEach((item, index) => {
    if (!isRecord(item)) {
      throw new Error(`Result ${index} is not an object`);
    }
    const text = readString(item, 'text')?.trim();
    if (!text) {
      return;
    }
    aggregator.append({
      speakerId: readString(item, 'speaker')?.trim() || UNKNOWN_SPEAKER_ID,
      text,
      offsetSeconds: readNumber(item, 'offset') ?? 0,
      durationSeconds: readNumber(item, 'duration') ?? DEFAULT_SEGMENT_SECONDS,
      confidence: readNumber(item, 'confidence'),
      clientTimestamp: now,
      source: { epoch: 1, sequence: index + 1 }
    });
  });

  const segments = aggregator.segments();
  const durationSeconds = segments.reduce(
    (end, segment) => Math.max(end, segment.offsetSeconds + segment.durationSeconds),
    0
  );
  return {
    id: sessionId,
    startTime: new Date(now - Math.round(durationSeconds * 1000)).toISOString(),
    endTime: new Date(now).toISOString(),
    durationSeconds: Math.floor(durationSeconds),
    speakerCount: aggregator.speakerCount,
    stopReason: 'user',
    segments
  };
}

/**
 * Stateless recognition backend: every chunk is an independent request
 */
export function createLiveRouter(options: LiveRoutesOptions): Router {
  const router = express.Router();
  const clock = options.clock ?? Date.now;
  const engine = options.engine ?? new MockRecognitionEngine(clock);
  const tokenTtlSeconds = options.tokenTtlSeconds ?? 540;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: MAX_CHUNK_BYTES
    }
  });

  /**
   * Recognize one uploaded audio chunk
   */
  router.post('/transcribe', upload.single('audio_file'), async (req: Request, res: Response) => {
    if (!req.file) {
      res.status(400).json({ error: 'No audio file provided' });
      return;
    }

    const fields: unknown = req.body;
    const sessionId = (isRecord(fields) ? readString(fields, 'session_id') : undefined) ?? 'default';
    try {
      console.log(`Processing chunk for ${sessionId}: ${req.file.size} bytes (${req.file.mimetype})`);
      const result = await engine.transcribe(req.file.buffer, sessionId);
      res.json(result);
    } catch (error) {
      console.error('Live transcription failed:', describeError(error));
      res.status(500).json({ error: `Transcription failed: ${describeError(error)}` });
    }
  });

  /**
   * Credential for the recognition service, or mock mode when none is configured
   */
  router.get('/token', (req: Request, res: Response) => {
    if (!options.speechKey) {
      console.warn('No speech service credentials available');
      res.json({
        success: false,
        error: 'No speech service credentials configured',
        mock_mode: true
      });
      return;
    }

    res.json({
      success: true,
      key: options.speechKey,
      region: options.speechRegion,
      auth_method: 'subscription_key',
      expires_at: Math.floor(clock() / 1000) + tokenTtlSeconds
    });
  });

  /**
   * Service status
   */
  router.get('/status', (req: Request, res: Response) => {
    res.json({
      service: 'Live Transcription',
      mode: 'stateless',
      engine: engine.name,
      speech_service_available: Boolean(options.speechKey),
      endpoints: {
        transcribe: 'POST /live/transcribe',
        token: 'GET /live/token',
        save: 'POST /live/save',
        status: 'GET /live/status'
      },
      supported_formats: SUPPORTED_FORMATS,
      timestamp: clock() / 1000
    });
  });

  /**
   * Save a client-collected live session to history
   */
  router.post('/save', express.json({ limit: '5mb' }), async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const record: JsonRecord = isRecord(body) ? body : {};
    const sessionId = readString(record, 'session_id');
    const results = record.results;
    if (!sessionId || !isValidSessionId(sessionId) || !Array.isArray(results)) {
      res.status(400).json({ error: 'Invalid transcription data format' });
      return;
    }

    let summary: SessionSummary;
    try {
      summary = summaryFromLiveResults(sessionId, results, clock());
    } catch (error) {
      res.status(400).json({ error: `Invalid transcription data format: ${describeError(error)}` });
      return;
    }

    try {
      await options.historyStore.save(summary);
      console.log(`Saved live session ${sessionId} with ${summary.segments.length} segments`);
      res.json({
        success: true,
        session_id: sessionId,
        segments: summary.segments.length,
        message: 'Live session saved to history'
      });
    } catch (error) {
      console.error('Error saving live session:', describeError(error));
      res.status(500).json({ error: 'Failed to save live session' });
    }
  });

  router.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: error.message });
      return;
    }
    next(error);
  });

  return router;
}
