import 'dotenv/config';
import { buildDependencies, createApp } from './app.js';
import { loadEnv } from './config/env.js';

const env = loadEnv();
const deps = buildDependencies(env);
const app = createApp(deps);

app.listen(env.PORT, () => {
  const mode = deps.enhancer.name === 'disabled' ? 'AI enhancement off' : `enhancer: ${deps.enhancer.name}`;
  console.log(`API running on http://localhost:${env.PORT} (${mode})`);
});
