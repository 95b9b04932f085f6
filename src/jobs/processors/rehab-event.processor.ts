import type { Job } from 'bullmq';
import { EVENT_TOPICS, isEventOf } from '../queue.js';
import type { RehabEventJobData } from '../queue.js';
import { CLINICAL_FEATURES, profileService } from '../../services/profile.service.js';

export interface RehabEventResult {
  topic: RehabEventJobData['topic'];
  profileRefreshed: boolean;
}

/**
 * Consume one rehab event. Clinical records are folded into the inmate's
 * profile features; the other topics are only logged.
 */
export async function processRehabEvent(
  job: Pick<Job<RehabEventJobData>, 'id' | 'data'>
): Promise<RehabEventResult> {
  const { data } = job;
  console.log(`[rehab-events] Processing ${data.topic} (job ${job.id ?? 'unknown'})`);

  if (isEventOf(data, EVENT_TOPICS.MEDICAL_REPORT_ADDED)) {
    const profile = await profileService.refreshFeatures(data.payload.inmateId, {
      [CLINICAL_FEATURES.LAST_DIAGNOSIS]: data.payload.diagnosis,
    });
    return { topic: data.topic, profileRefreshed: profile !== null };
  }

  if (isEventOf(data, EVENT_TOPICS.COUNSELING_NOTE_ADDED)) {
    const profile = await profileService.refreshFeatures(data.payload.inmateId, {
      [CLINICAL_FEATURES.LAST_SESSION_SCORE]: data.payload.sessionScore,
      [CLINICAL_FEATURES.LAST_SESSION_SENTIMENT]: data.payload.sentiment,
    });
    return { topic: data.topic, profileRefreshed: profile !== null };
  }

  if (isEventOf(data, EVENT_TOPICS.RECOMMENDATION_CREATED)) {
    const { recommendationId, inmateId, degraded } = data.payload;
    console.log(
      `[rehab-events] Recommendation ${recommendationId} created for inmate ${inmateId}${degraded ? ' (degraded)' : ''}`
    );
  } else if (isEventOf(data, EVENT_TOPICS.PROGRESS_UPDATED)) {
    const { recommendationId, status, completed } = data.payload;
    console.log(
      `[rehab-events] Progress on ${recommendationId}: ${status}${completed ? ', completed' : ''}`
    );
  }

  return { topic: data.topic, profileRefreshed: false };
}
