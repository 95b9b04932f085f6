export {
  selectStation,
  selectOfficer,
  scoreStation,
  scoreOfficer,
  isStationEligible,
  isOfficerEligible,
} from './assignment-engine.js';
export {
  WEIGHTS,
  specializationScore,
  proximityScore,
  loadScore,
  successScore,
  stationComposite,
  officerComposite,
} from './scoring.js';
export type { ScoreBreakdown, StationMatch, OfficerMatch, AssignmentNeeds } from './types.js';
