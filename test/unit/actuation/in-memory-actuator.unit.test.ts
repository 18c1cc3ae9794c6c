import { InMemoryActuator } from '../../../src/actuation/InMemoryActuator';

describe('InMemoryActuator', () => {
  let actuator: InMemoryActuator;

  beforeEach(() => {
    actuator = new InMemoryActuator();
  });

  it('should steal an address on acquire', async () => {
    actuator.associate('ip-a', 'A');

    await actuator.acquire('ip-a', 'B');

    expect(actuator.holderOf('ip-a')).toBe('B');
  });

  it('should only release from the current holder', async () => {
    actuator.associate('ip-a', 'B');

    await actuator.release('ip-a', 'A');
    expect(actuator.holderOf('ip-a')).toBe('B');

    await actuator.release('ip-a', 'B');
    expect(actuator.holderOf('ip-a')).toBeUndefined();
  });

  it('should emit association changes', async () => {
    const associated = jest.fn();
    const disassociated = jest.fn();
    actuator.on('associated', associated);
    actuator.on('disassociated', disassociated);

    await actuator.acquire('ip-a', 'A');
    await actuator.release('ip-a', 'A');

    expect(associated).toHaveBeenCalledWith('ip-a', 'A');
    expect(disassociated).toHaveBeenCalledWith('ip-a', 'A');
  });

  it('should fail the requested number of calls', async () => {
    actuator.failNext(1);

    await expect(actuator.acquire('ip-a', 'A')).rejects.toThrow('Simulated provider error associating ip-a');
    await expect(actuator.acquire('ip-a', 'A')).resolves.toBeUndefined();
    expect(actuator.getCalls()).toEqual([
      { kind: 'acquire', ipId: 'ip-a', instanceId: 'A', ok: false },
      { kind: 'acquire', ipId: 'ip-a', instanceId: 'A', ok: true }
    ]);
  });

  it('should fail calls for one IP until recovered', async () => {
    actuator.failFor('ip-b');

    await expect(actuator.acquire('ip-b', 'A')).rejects.toThrow();
    await expect(actuator.acquire('ip-a', 'A')).resolves.toBeUndefined();

    actuator.recover('ip-b');
    await expect(actuator.acquire('ip-b', 'A')).resolves.toBeUndefined();
  });

  it('should describe current associations as a copy', async () => {
    actuator.associate('ip-a', 'A');

    const assignments = await actuator.describeAssignments();
    assignments.set('ip-a', 'Z');

    expect(actuator.holderOf('ip-a')).toBe('A');
    expect(Array.from(assignments.keys())).toEqual(['ip-a']);
  });
});
