export { submitJob, jobOptionsSchema, type UploadInput, type SubmittedJob, type JobOptionsInput } from './submit-job'
export { runPlaybookJob, type RunPlaybookJobOptions, type RunPlaybookJobResult } from './run-playbook-job'
export { analyzeChunks, type AnalyzeChunksOptions, type ChunkAnalysisOutcome } from './analyze-chunks'
export { findJob, getJobStatus, parseJobId } from './job-status'
