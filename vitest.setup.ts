// Placeholder environment so src/config.ts validates under test.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.API_SECRET_KEY = 'test-secret-key-0000';
process.env.AUTO_REPLY_RECIPIENT = '+15550000000';
