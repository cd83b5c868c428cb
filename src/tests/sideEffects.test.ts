import {runBestEffort} from '../pure/sideEffects';

const context = {userId: 7, orderId: 5};

describe('runBestEffort', () => {
  let errorSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('raises no alert when every task succeeds', async () => {
    const monitoring = {sendAlerts: jest.fn().mockResolvedValue(undefined)};

    const alerts = await runBestEffort(
      [{name: 'status_history', run: jest.fn().mockResolvedValue(undefined)}],
      context,
      monitoring
    );

    expect(alerts).toEqual([]);
    expect(monitoring.sendAlerts).not.toHaveBeenCalled();
  });

  it('runs every task and alerts once for the failures', async () => {
    const monitoring = {sendAlerts: jest.fn().mockResolvedValue(undefined)};
    const notify = jest.fn().mockResolvedValue(undefined);

    const alerts = await runBestEffort(
      [
        {name: 'status_history', run: jest.fn().mockRejectedValue(new Error('history table locked'))},
        {name: 'status_notification', run: notify},
      ],
      context,
      monitoring
    );

    expect(notify).toHaveBeenCalled();
    expect(alerts).toEqual([{
      type: 'side_effect_failed',
      sideEffect: 'status_history',
      userId: 7,
      orderId: 5,
      detail: 'history table locked',
    }]);
    expect(monitoring.sendAlerts).toHaveBeenCalledWith(alerts);
    expect(errorSpy).toHaveBeenCalled();
  });

  it('logs when the alert itself cannot be delivered', async () => {
    const monitoring = {sendAlerts: jest.fn().mockRejectedValue(new Error('Monitoring service unavailable'))};

    const alerts = await runBestEffort(
      [{name: 'loyalty_credit', run: jest.fn().mockRejectedValue(new Error('ledger offline'))}],
      context,
      monitoring
    );

    expect(alerts).toHaveLength(1);
    expect(warnSpy).toHaveBeenCalledWith(
      '⚠️  Could not deliver 1 side effect alert(s):',
      'Monitoring service unavailable'
    );
  });
});
