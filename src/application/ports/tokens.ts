// Injection tokens (string symbols for DI)
export const WORKER_RUNNER_PORT = 'WorkerRunnerPort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
export const FILE_PROCESSOR_PORT = 'FileProcessorPort';
