// Keep test output readable; individual tests never depend on log lines
process.env.RAG_LOG_LEVEL = process.env.RAG_LOG_LEVEL ?? 'SILENT';
