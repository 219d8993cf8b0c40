import { env } from './config/env'
import { loadMonitorConfig } from './config/monitor'
import { closeRedis, initRedis } from './config/redis'
import { ActionExecutor } from './action/action.executor'
import { DecisionEngine } from './engine/decision'
import { CompetitionPolicy } from './engine/policies/competition.policy'
import { NormalPolicy } from './engine/policies/normal.policy'
import { ControlLoop } from './monitor/control-loop'
import { SyncService, verifyCredential } from './monitor/sync.service'
import { createAdsApi } from './platform/ads/client'
import { loadChannelDirectory } from './platform/channels'
import { log } from './platform/logger'
import { SnapshotStore } from './snapshot/snapshot.service'
import { RedisStateStore } from './store/redis.store'

async function bootstrap() {
  log.info('[Bootstrap] Ads budget pilot starting')
  const config = loadMonitorConfig()

  // 1. Redis（必需）
  const redis = initRedis(config.requestTimeoutMs)
  if (!redis) {
    log.error('[Bootstrap] Cannot start without Redis')
    process.exit(1)
  }
  const store = new RedisStateStore(redis, config.namespace, config.liveMetricsKey)

  // 2. 渠道凭证
  const channels = await loadChannelDirectory(env.CHANNELS_FILE)

  // 3. 平台 API（可选）
  const api = createAdsApi(config.adsApi, config.requestTimeoutMs)
  if (!api || !api.supports('listCampaigns')) {
    log.warn('[Bootstrap] Ads API endpoints not configured, running in store-only mode')
  }

  const snapshots = new SnapshotStore(store, {
    intervalSec: config.snapshotIntervalSec,
    retentionHours: config.snapshotRetentionHours,
  })
  const engine = new DecisionEngine(
    {
      normal: new NormalPolicy(config.pauseSpendFloor),
      competition: new CompetitionPolicy(config.budgetFullRatio),
    },
    snapshots,
    config.budget,
  )
  const executor = new ActionExecutor(store, api, config.budget)
  const sync = new SyncService(store, api, channels, config.budgetFullRatio)

  // 4. 启动前验证一次凭证（失败不影响启动）
  if (api?.supports('verifyAuth')) {
    await verifyCredential(store, api, channels)
  }

  const loop = new ControlLoop({ config, store, sync, snapshots, engine, executor, channels })

  const shutdown = (signal: string) => {
    log.info(`[Bootstrap] ${signal} received, stopping after current cycle`)
    loop.stop()
  }
  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))

  await loop.start()
  await closeRedis()
}

bootstrap().catch((err) => {
  log.error('Bootstrap failed', { error: err instanceof Error ? err.stack : String(err) })
  process.exit(1)
})
