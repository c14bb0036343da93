/**
 * Flat-map stage tests
 */

import { describe, it, expect } from 'vitest';
import {
  CollectorSink,
  createFlatMapStage,
  createHostInput,
  createRecordingSink,
  createTick,
  type Decoder,
  type HostInput,
  type OutputCollector,
} from './index';

type Row = { ts: number; text: string };

const decoder: Decoder<Row, string> = (raw) => ({ timestamp: raw.ts, value: raw.text });

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('createFlatMapStage', () => {
  it('should stamp every output with the record timestamp', async () => {
    const sink = createRecordingSink<HostInput<Row>, string>();
    const stage = createFlatMapStage({ decoder, sink, flatMap: (text: string) => text.split(' ') });
    const input = createHostInput('lines', { ts: 42, text: 'to be or' });

    await stage.invoke(input);

    expect(sink.emissions).toEqual([
      {
        kind: 'success',
        group: [input],
        outputs: [
          { timestamp: 42, value: 'to' },
          { timestamp: 42, value: 'be' },
          { timestamp: 42, value: 'or' },
        ],
      },
    ]);
  });

  it('should emit asynchronous results on a later drain', async () => {
    const sink = createRecordingSink<HostInput<Row>, number>();
    const stage = createFlatMapStage({ decoder, sink, flatMap: async (text: string) => [text.length] });

    await stage.invoke(createHostInput('lines', { ts: 7, text: 'abc' }));
    await flush();
    await stage.invoke(createTick());

    expect(sink.emissions).toHaveLength(1);
    expect(sink.emissions[0]).toMatchObject({ kind: 'success', outputs: [{ timestamp: 7, value: 3 }] });
  });

  it('should fail only the group of a throwing record', async () => {
    const sink = createRecordingSink<HostInput<Row>, string>();
    const stage = createFlatMapStage({
      decoder,
      sink,
      flatMap: (text: string) => {
        if (text === '') throw new Error('empty line');
        return [text];
      },
    });
    const bad = createHostInput('lines', { ts: 1, text: '' });

    await expect(stage.invoke(bad)).resolves.toBeUndefined();
    await stage.invoke(createHostInput('lines', { ts: 2, text: 'fine' }));
    await flush();
    await stage.invoke(createTick());

    expect(sink.emissions).toHaveLength(2);
    const failure = sink.emissions.find((e) => e.kind === 'failure');
    expect(failure?.group).toEqual([bad]);
    expect(failure?.kind === 'failure' ? failure.error.message : null).toBe('empty line');
    expect(sink.emissions.filter((e) => e.kind === 'success')).toHaveLength(1);
  });

  it('should drive a collector end to end', async () => {
    const calls: unknown[][] = [];
    const collector: OutputCollector<HostInput<Row>, string> = {
      emit: (anchors, values) => { calls.push(['emit', anchors?.length ?? 0, values]); },
      ack: (handle) => { calls.push(['ack', handle.streamId]); },
      fail: (handle) => { calls.push(['fail', handle.streamId]); },
      reportError: (error) => { calls.push(['reportError', error.message]); },
    };
    const sink = new CollectorSink({ collector, encoder: (o: { timestamp: number; value: string }) => `${o.timestamp}|${o.value}` });
    const stage = createFlatMapStage({ decoder, sink, flatMap: (text: string) => text.split(',') });

    await stage.invoke(createHostInput('lines', { ts: 5, text: 'x,y' }));

    expect(calls).toEqual([
      ['emit', 1, '5|x'],
      ['emit', 1, '5|y'],
      ['ack', 'lines'],
    ]);
  });
});
