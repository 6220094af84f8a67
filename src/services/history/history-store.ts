import { logger } from '../../config/logger';
import { VideoHistory, type VideoHistoryFields } from '../../models/VideoHistory';
import { errorMessage } from '../pipeline/pipeline-error';

export interface HistoryStore {
  /** Never rejects; a failed write is logged. */
  record(entry: VideoHistoryFields): Promise<void>;
}

type Persist = (entry: VideoHistoryFields) => Promise<unknown>;

export class VideoHistoryStore implements HistoryStore {
  constructor(private readonly persist: Persist = (entry) => VideoHistory.create(entry)) {}

  async record(entry: VideoHistoryFields): Promise<void> {
    try {
      await this.persist(entry);
      logger.info(`History recorded: ${entry.videoType} "${entry.topic}"`);
    } catch (error) {
      logger.warn(`Failed to record video history: ${errorMessage(error)}`);
    }
  }
}

export default new VideoHistoryStore();
