import { DEFAULT_MONITOR_CONFIG, loadMonitorConfig } from '../../src/config/monitor'

describe('loadMonitorConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadMonitorConfig({})
    expect(config).toEqual(DEFAULT_MONITOR_CONFIG)
    expect(config.adsApi).toBeUndefined()
  })

  it('reads intervals, budget rules and storage keys', () => {
    const config = loadMonitorConfig({
      FETCH_INTERVAL_SEC: '60',
      SNAPSHOT_INTERVAL_SEC: '120',
      SNAPSHOT_RETENTION_HOURS: '6',
      CLEANUP_EVERY_CYCLES: '5',
      REQUEST_TIMEOUT_MS: '3000',
      MIN_BUDGET: '300',
      BUDGET_INCREMENT: '50',
      STATE_NAMESPACE: 'shop_x',
      LIVE_METRICS_KEY: 'live:x',
    })
    expect(config.fetchIntervalSec).toBe(60)
    expect(config.snapshotIntervalSec).toBe(120)
    expect(config.snapshotRetentionHours).toBe(6)
    expect(config.cleanupEveryCycles).toBe(5)
    expect(config.requestTimeoutMs).toBe(3000)
    expect(config.budget).toEqual({ minBudget: 300, increment: 50, roundingStep: 25, validEndings: [0, 25, 50, 75] })
    expect(config.namespace).toBe('shop_x')
    expect(config.liveMetricsKey).toBe('live:x')
  })

  it('falls back on invalid or non-positive numbers', () => {
    const config = loadMonitorConfig({ FETCH_INTERVAL_SEC: 'abc', MIN_BUDGET: '-5', CLEANUP_EVERY_CYCLES: '0', STATE_NAMESPACE: '  ' })
    expect(config.fetchIntervalSec).toBe(180)
    expect(config.budget.minBudget).toBe(200)
    expect(config.cleanupEveryCycles).toBe(10)
    expect(config.namespace).toBe('ads_monitor')
  })

  it('configures the ads API only when a base URL is set', () => {
    expect(loadMonitorConfig({ ADS_SET_BUDGET_PATH: '/budget' }).adsApi).toBeUndefined()

    const config = loadMonitorConfig({
      ADS_API_BASE_URL: 'https://ads.example.test',
      ADS_SET_BUDGET_PATH: '/budget',
      ADS_PAUSE_PATH: '',
    })
    expect(config.adsApi).toEqual({ baseUrl: 'https://ads.example.test', setBudgetPath: '/budget' })
    expect(config.adsApi?.pausePath).toBeUndefined()
  })
})
