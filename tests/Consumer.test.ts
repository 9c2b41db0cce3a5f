import { Simulation } from '../src/kernel/Simulation';
import { Consumer } from '../src/pipeline/Consumer';
import { BoundedQueue } from '../src/queue/BoundedQueue';

describe('Consumer', () => {
  it('should take one value per service delay', async () => {
    const sim = new Simulation();
    const queue = new BoundedQueue<number>(5, { clock: sim });
    await queue.put(1);
    await queue.put(2);
    await queue.put(3);

    const received: Array<[number, number]> = [];
    const consumer = new Consumer(sim, queue, {
      serviceDelay: 100,
      onItem: (value, time) => received.push([value, time]),
    });

    sim.spawn('consumer', () => consumer.run());
    const endTime = await sim.run();

    expect(received).toEqual([[1, 0], [2, 100], [3, 200]]);
    // still waiting for a fourth value when the simulation ran dry
    expect(endTime).toBe(300);
    expect(queue.finalizeStats().emptyStalls).toBe(1);
  });

  it('should wait on an empty queue until a value arrives', async () => {
    const sim = new Simulation();
    const queue = new BoundedQueue<number>(5, { clock: sim });
    const consumer = new Consumer(sim, queue, { serviceDelay: 100 });
    const itemHandler = jest.fn();
    consumer.on('consumer:item', itemHandler);

    sim.spawn('consumer', () => consumer.run());
    sim.spawn('late-writer', async () => {
      await sim.delay(500);
      await queue.put(9);
    });
    await sim.run();

    expect(itemHandler).toHaveBeenCalledTimes(1);
    expect(itemHandler).toHaveBeenCalledWith({ value: 9, time: 500 });
    expect(queue.finalizeStats().totalElapsedTime).toBe(500);
  });
});
