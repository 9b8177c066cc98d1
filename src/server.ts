import { createApp } from './app.js'
import { loadConfig } from './config.js'

const cfg = loadConfig()
const app = createApp(cfg)

app.listen(cfg.port, () => {
  // eslint-disable-next-line no-console
  console.log(`cendoj-action listening on port ${cfg.port}`, { requireHttps: cfg.requireHttps })
})
