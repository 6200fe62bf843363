import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { RecordStore } from '../../src/db/recordStore';

const config = loadConfig();
const store = new RecordStore(config.dataFile);
const { loaded, skipped } = store.load();
if (skipped > 0) {
  console.warn(`[api] ${skipped} malformed rows in ${config.dataFile} were skipped`);
}

const app = createApp(store);

app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port} (${loaded} expenses)`);
});

export default app;
