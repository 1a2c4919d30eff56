// Central service naming constants to avoid drift between processes.

export const SERVICE_INGESTION_DISPATCHER = 'ingestion-dispatcher'
export const SERVICE_INGESTION_PRODUCER = 'ingestion-producer'
