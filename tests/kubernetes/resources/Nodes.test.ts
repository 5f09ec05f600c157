import {
  Node,
  NodeList,
  parseNodeStats,
  parseStatsTimestamp,
  toNumericTree,
} from '../../../src/kubernetes/resources/Nodes.js';
import { EmptyAggregationError, MalformedStatsError } from '../../../src/kubernetes/ErrorHandling.js';
import { Group } from '../../../src/sections/Group.js';
import { createNode, kubeletStats } from '../fixtures.js';

const GI = 1024 ** 3;

const node1Stats = kubeletStats(
  { timestamp: '2024-05-01T10:00:00.123456789Z', cpu: { usage: 1 } },
  {
    timestamp: '2024-05-01T10:00:10.5Z',
    cpu: { usage: 2, name: 'cpu' },
    memory: { usage: 512 },
    filesystem: [{ device: '/dev/sda' }],
  },
);

const node2Stats = kubeletStats({
  timestamp: '2024-05-01T10:00:20Z',
  cpu: { usage: 3 },
  memory: { usage: 256 },
  network: { rx: 7 },
});

describe('Nodes', () => {
  describe('parseStatsTimestamp', () => {
    it('should drop fractional seconds', () => {
      expect(parseStatsTimestamp('2024-05-01T10:00:10.123456789Z')).toBe(1714557610);
      expect(parseStatsTimestamp('2024-05-01T10:00:10Z')).toBe(1714557610);
    });

    it('should reject unparseable timestamps', () => {
      expect(() => parseStatsTimestamp('yesterday')).toThrow(MalformedStatsError);
    });
  });

  describe('toNumericTree', () => {
    it('should keep numbers and nested objects only', () => {
      expect(
        toNumericTree({ a: 1, b: 'x', c: [1], d: { e: 2, f: true }, g: null }),
      ).toEqual({ a: 1, d: { e: 2 } });
    });
  });

  describe('parseNodeStats', () => {
    it('should keep the latest sample as reported', () => {
      const snapshot = parseNodeStats(node1Stats, 'node1');
      expect(snapshot).toEqual({
        timestamp: 1714557610,
        cpu: { usage: 2, name: 'cpu' },
        memory: { usage: 512 },
        filesystem: [{ device: '/dev/sda' }],
      });
      expect(Object.keys(snapshot)).toEqual(['timestamp', 'cpu', 'memory', 'filesystem']);
    });

    it('should accept an already decoded reply', () => {
      expect(parseNodeStats({ stats: [{ timestamp: '2024-05-01T10:00:00Z', load: 4 }] })).toEqual({
        load: 4,
        timestamp: 1714557600,
      });
    });

    it('should reject text that is not JSON', () => {
      expect(() => parseNodeStats('<html>', 'node1')).toThrow(
        /^Statistics of node node1 are not JSON/,
      );
    });

    it('should reject replies without a stats list', () => {
      expect(() => parseNodeStats({ samples: [] }, 'node1')).toThrow(MalformedStatsError);
    });

    it('should reject replies without samples', () => {
      expect(() => parseNodeStats(kubeletStats(), 'node1')).toThrow(
        'Node node1 reported no statistics samples',
      );
    });
  });

  describe('Node', () => {
    it('should parse capacity and allocatable amounts', () => {
      const node = new Node(createNode('node1'), node1Stats);
      expect(node.name).toBe('node1');
      expect(node.resources).toEqual({
        capacity: { cpu: 2, memory: 4 * GI, pods: 110 },
        allocatable: { cpu: 1.5, memory: 3 * GI, pods: 110 },
      });
    });

    it('should default missing amounts to zero', () => {
      const node = new Node(createNode('node1', { cpu: '1' }, {}), node1Stats);
      expect(node.resources).toEqual({
        capacity: { cpu: 1, memory: 0, pods: 0 },
        allocatable: { cpu: 0, memory: 0, pods: 0 },
      });
    });

    it('should report zero resources without a status', () => {
      const node = new Node({ metadata: { name: 'node1' } }, node1Stats);
      expect(node.resources).toEqual(Node.zeroResources());
      expect(node.conditions).toBeUndefined();
    });

    it('should map condition types to statuses', () => {
      const node = new Node(
        createNode('node1', undefined, undefined, [
          { type: 'Ready', status: 'True' },
          { type: 'MemoryPressure', status: 'False' },
        ]),
        node1Stats,
      );
      expect(node.conditions).toEqual({ Ready: 'True', MemoryPressure: 'False' });
    });

    it('should report no conditions for an empty list', () => {
      const node = new Node(createNode('node1', undefined, undefined, []), node1Stats);
      expect(node.conditions).toBeUndefined();
    });
  });

  describe('NodeList', () => {
    const list = new NodeList([
      new Node(createNode('node1'), node1Stats),
      new Node(
        createNode(
          'node2',
          { cpu: '4', memory: '8Gi', pods: '110' },
          { cpu: '3500m', memory: '7Gi', pods: '100' },
          [],
        ),
        node2Stats,
      ),
    ]);

    it('should list node names', () => {
      expect(list.length).toBe(2);
      expect(list.listNodes()).toEqual({ nodes: ['node1', 'node2'] });
    });

    it('should leave out nodes without conditions', () => {
      expect(list.conditions()).toEqual(new Map([['node1', { Ready: 'True' }]]));
    });

    it('should key resources and stats by node name', () => {
      expect([...list.resources().keys()]).toEqual(['node1', 'node2']);
      expect(list.stats().get('node2')).toEqual({
        timestamp: 1714557620,
        cpu: { usage: 3 },
        memory: { usage: 256 },
        network: { rx: 7 },
      });
    });

    it('should sum resources over the cluster', () => {
      expect(list.clusterResources()).toEqual({
        capacity: { cpu: 6, memory: 12 * GI, pods: 220 },
        allocatable: { cpu: 5, memory: 10 * GI, pods: 210 },
      });
    });

    it('should sum statistics and average the timestamps', () => {
      expect(list.clusterStats()).toEqual({
        timestamp: 1714557615,
        cpu: { usage: 5 },
        memory: { usage: 768 },
      });
    });

    it('should leave the node snapshots untouched when summing', () => {
      list.clusterStats();
      expect(list.stats().get('node1')).toEqual(parseNodeStats(node1Stats, 'node1'));
    });

    it('should round the mean timestamp to one decimal', () => {
      const odd = new NodeList([
        new Node(createNode('a'), kubeletStats({ timestamp: '2024-05-01T10:00:10Z', x: 1 })),
        new Node(createNode('b'), kubeletStats({ timestamp: '2024-05-01T10:00:11Z', x: 1 })),
      ]);
      expect(odd.clusterStats().timestamp).toBe(1714557610.5);
    });

    it('should report strings and lists of the sample in the node section', () => {
      const detailed = new NodeList([
        new Node(
          createNode('node1'),
          kubeletStats({
            timestamp: '2024-05-01T10:00:10Z',
            cpu: { usage: { total: 5, per_cpu_usage: [2, 3] } },
            network: { name: 'eth0', rx_bytes: 7, interfaces: [{ name: 'eth0', rx_bytes: 7 }] },
            filesystem: [{ device: '/dev/sda1', capacity: 100, available: 40 }],
          }),
        ),
      ]);

      expect(new Group().join('k8s_stats', detailed.stats()).output()).toEqual([
        '<<<<node1>>>>',
        '<<<k8s_stats:sep(0)>>>',
        '{"timestamp": 1714557610, ' +
          '"cpu": {"usage": {"total": 5, "per_cpu_usage": [2, 3]}}, ' +
          '"network": {"name": "eth0", "rx_bytes": 7, "interfaces": [{"name": "eth0", "rx_bytes": 7}]}, ' +
          '"filesystem": [{"device": "/dev/sda1", "capacity": 100, "available": 40}]}',
        '<<<<>>>>',
      ]);
      expect(detailed.clusterStats()).toEqual({
        timestamp: 1714557610,
        cpu: { usage: { total: 5 } },
        network: { rx_bytes: 7 },
      });
    });

    it('should fail to aggregate an empty cluster', () => {
      const empty = new NodeList([]);
      expect(() => empty.clusterResources()).toThrow(
        'Cannot aggregate an empty list of node resources without a seed',
      );
      expect(() => empty.clusterStats()).toThrow(EmptyAggregationError);
    });
  });
});
