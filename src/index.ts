import { createApp } from './app';
import { config } from './config';
import { logger } from './utils/logger';

const app = createApp();

// Start server
const port = config.port;

app.listen(port, () => {
  logger.info(`SRT document engine`);
  logger.info(`Server running on http://localhost:${port}`);
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`API Endpoints:`);
  logger.info(`- GET    /api/health                  - Check service status`);
  logger.info(`- GET    /api/documents               - List open documents`);
  logger.info(`- POST   /api/documents               - Open a document from text`);
  logger.info(`- POST   /api/upload                  - Open a document from an SRT file`);
  logger.info(`- GET    /api/documents/:id           - Get document details`);
  logger.info(`- GET    /api/documents/:id/download  - Download the SRT text`);
  logger.info(`- PUT    /api/documents/:id/point     - Place the cursor`);
  logger.info(`- POST   /api/documents/:id/navigate  - Move between subtitles`);
  logger.info(`- POST   /api/documents/:id/playback  - Follow the player position`);
  logger.info(`- POST   /api/documents/:id/edit      - Edit timing and structure`);
  logger.info(`- DELETE /api/documents/:id           - Close a document`);
});

export default app;
