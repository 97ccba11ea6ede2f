export {
  listCandidates,
  CandidateSourceError,
  EXCLUDED_DIRS,
  type ListCandidatesOptions,
} from './candidate-source.js';
