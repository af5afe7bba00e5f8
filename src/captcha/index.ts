export {
  ChallengeDetector,
  scanForChallenge,
  type ChallengeDetection,
  type ChallengeKind,
} from './challenge-detector.js';
