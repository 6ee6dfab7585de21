/**
 * Example Switch Panel
 *
 * Connects to a hub, lists every wall-switch channel with its state and
 * prints push-driven changes. Pass a unique id to toggle that channel once.
 *
 *   HUB_HOST=192.168.1.50 npx tsx examples/switch-panel/index.ts lifesmart_switch_abc_L1
 */

import { SyncCoordinator, WsHubClient, discoverSwitches } from '../../src/index.js';

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

const HUB_HOST = process.env['HUB_HOST'] ?? 'localhost';
const HUB_PORT = Number(process.env['HUB_PORT'] ?? '8888');
const TOGGLE_ID = process.argv[2];

// -----------------------------------------------------------------------------
// Main
// -----------------------------------------------------------------------------

async function main(): Promise<void> {
  const client = new WsHubClient({ host: HUB_HOST, port: HUB_PORT });
  const coordinator = new SyncCoordinator(client, { scanIntervalMs: 30000 });

  if (!(await coordinator.start())) {
    console.error(`Hub at ${client.url} did not answer: ${coordinator.getLastError()?.message ?? 'unknown error'}`);
  }

  const switches = discoverSwitches(coordinator);
  for (const entity of switches) {
    console.log(`${entity.uniqueId.padEnd(36)} ${entity.name.padEnd(24)} ${entity.isOn ? 'on' : 'off'}`);
  }

  coordinator.onEvent((event) => {
    if (event.type === 'delta_applied') {
      console.log(`[push] ${event.update.me}/${event.update.idx} = ${JSON.stringify(event.update.val)}`);
    }
  });

  if (TOGGLE_ID) {
    const entity = switches.find((s) => s.uniqueId === TOGGLE_ID);
    if (!entity) {
      console.error(`No switch ${TOGGLE_ID}`);
    } else {
      const sent = entity.isOn ? await entity.turnOff() : await entity.turnOn();
      console.log(sent ? `${entity.name} is now ${entity.isOn ? 'on' : 'off'}` : 'Hub unavailable; nothing sent');
    }
  }

  const shutdown = () => {
    coordinator
      .stop()
      .then(() => client.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
