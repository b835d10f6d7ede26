import { createApp } from './app.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const container = new AppContainer();
const app = createApp(container);
const port = container.config.app.port;

app.listen(port, () => {
  console.log(`🚀 Smart Choice Finance API listening on port ${port}`);
  console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`💱 Live currency quotes: ${container.hasLiveQuotes()}`);
  console.log(`🤖 LLM narration configured: ${container.hasLlm()}`);
});
