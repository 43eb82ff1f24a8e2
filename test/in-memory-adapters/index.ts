/**
 * In-Memory Adapters Barrel Export
 */
export { InMemoryEventPublisherAdapter } from './in-memory-event-publisher.adapter';
export { ScriptedWorkerRunner, type WorkerScript } from './scripted-worker-runner.adapter';
