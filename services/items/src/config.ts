import 'dotenv/config';

export const config = {
  port: parseInt(process.env.PORT || '8000', 10),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  service: {
    name: process.env.SERVICE_NAME || 'Item Catalog API',
    version: process.env.SERVICE_VERSION || '1.0.0',
  },
};
