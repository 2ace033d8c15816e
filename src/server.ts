import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createApp } from './infrastructure/http/createApp.js';

export const startServer = (container: AppContainer = new AppContainer()) => {
  const app = createApp(container);
  const { port } = container.config.server;

  return app.listen(port, () => {
    console.log(`🚀 Procurement pipeline API listening on port ${port}`);
    console.log(`📊 Environment: ${container.config.app.environment}`);
    console.log(`📐 Std dev mode: ${container.config.pipeline.stdDevMode}, outlier sigma: ${container.config.pipeline.outlierSigma}`);
  });
};
