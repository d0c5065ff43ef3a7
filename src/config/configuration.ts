export default () => ({
  app: {
    port: parseInt(process.env.PORT || '3000', 10),
    schemaDir: process.env.EDI_SCHEMA_DIR || './schema',
    exportDir: process.env.EDI_EXPORT_DIR || './export',
  },
});
