import * as path from 'path';
import { FailoverConfiguration } from '../src/config/FailoverConfiguration';
import { FailoverCoordinator } from '../src/failover/FailoverCoordinator';
import { InMemoryMembershipSource } from '../src/membership/InMemoryMembershipSource';
import { InMemoryActuator } from '../src/actuation/InMemoryActuator';
import { StatusServer } from '../src/status/StatusServer';

/**
 * Demonstration of floating IP failover on a simulated three-zone cluster.
 * The coordinator runs against an in-memory gossip feed and provider, so the
 * whole failure and recovery cycle can be watched from one process.
 */
async function demonstrateFailover() {
  console.log('=== Floating IP Failover Demonstration ===\n');

  console.log('1. Loading configuration...');
  const config = new FailoverConfiguration('development');
  await config.loadFromFile(path.join(__dirname, '../config/eip.example.yaml'));
  const options = config.toCoordinatorOptions();
  console.log(`   ✓ ${options.selfId} with ${options.pool?.length ?? 0} floating IPs\n`);

  const source = new InMemoryMembershipSource({
    totalSize: 3,
    aliveInstanceIds: ['proxy-a', 'proxy-b', 'proxy-c']
  });
  const actuator = new InMemoryActuator(50);
  actuator.on('associated', (ipId, instanceId) => console.log(`   → ${ipId} now points at ${instanceId}`));

  const coordinator = new FailoverCoordinator(source, actuator, options);
  coordinator.on('warning', warning => console.log(`   ! ${warning.kind}: ${warning.message}`));

  const status = new StatusServer(coordinator, { port: 0 });
  await status.start();

  console.log('2. Cold start...');
  await coordinator.start();
  await coordinator.idle();
  console.log(`   ✓ Ready, status at http://127.0.0.1:${status.port ?? 0}/status\n`);

  console.log('3. proxy-c fails...');
  source.publish({ type: 'fail', instanceId: 'proxy-c' });
  await coordinator.idle();
  console.log('');

  console.log('4. proxy-c comes back...');
  source.publish({ type: 'join', instanceId: 'proxy-c' });
  await coordinator.idle();
  console.log('');

  console.log('5. proxy-b and proxy-c fail together, quorum is lost...');
  source.publish({ type: 'fail', instanceId: 'proxy-b' });
  source.publish({ type: 'fail', instanceId: 'proxy-c' });
  await coordinator.idle();
  console.log('');

  for (const ip of coordinator.getStatus().ips) {
    console.log(`   ${ip.ipId}: ${ip.state}${ip.holder ? ` (${ip.holder})` : ''}`);
  }

  await coordinator.stop();
  await status.stop();
  console.log('\n=== Demonstration Complete ===');
}

export { demonstrateFailover };

if (require.main === module) {
  demonstrateFailover().catch(error => {
    console.error('Demo failed:', error);
    process.exit(1);
  });
}
