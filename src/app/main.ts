import { App } from './App.js'
import { logger } from '../utils/logger.js'

const app = new App()
app.start()
  .catch(async (error) => {
    logger.error('Fatal error', { error })
    process.exitCode = 1
    await app.shutdown('startup failure')
  })
  .catch((error) => {
    logger.error('Shutdown failed', { error })
  })
