import { Message } from '../lib/pulsegraph/src/engine/message';
import { NodeRegistry } from '../lib/pulsegraph/src/engine/registry';
import { NodeLifecycleState } from '../lib/pulsegraph/src/types/node-state';
import { isProtocolViolation } from '../lib/pulsegraph/src/utils/node-error';
import { ConstantSource, CountingOutput, CountingProcessor } from './utils/test-nodes';

function violationKind(action: () => void): string | undefined {
  try {
    action();
  } catch (error) {
    return isProtocolViolation(error) ? error.kind : `unexpected: ${String(error)}`;
  }
  return undefined;
}

describe('NodeRegistry', () => {
  let registry: NodeRegistry;
  let source: ConstantSource;
  let first: CountingProcessor;
  let second: CountingProcessor;
  let output: CountingOutput;

  beforeEach(() => {
    registry = new NodeRegistry();
    source = new ConstantSource({}, { id: 'src' });
    first = new CountingProcessor({}, { id: 'first' });
    second = new CountingProcessor({}, { id: 'second' });
    output = new CountingOutput({ id: 'out' });
  });

  describe('membership', () => {
    it('should add nodes while connecting them', () => {
      registry.connect(first, source);

      expect(registry.size).toBe(2);
      expect(registry.has(source)).toBe(true);
      expect(first.registry).toBe(registry);
      expect(first.upstream).toBe(source);
      expect(source.listeners).toEqual([first]);
    });

    it('should reject nodes added twice', () => {
      registry.add(first);

      expect(violationKind(() => registry.add(first))).toBe('duplicate-node');
      expect(
        violationKind(() => registry.add(new CountingProcessor({}, { id: 'first' })))
      ).toBe('duplicate-node');
    });

    it('should reject nodes of another registry', () => {
      registry.add(first);

      expect(violationKind(() => new NodeRegistry().add(first))).toBe('foreign-graph');
    });

    it('should detach removed nodes', () => {
      registry.connect(first, source);
      registry.connect(output, first);

      registry.remove(first);

      expect(registry.has(first)).toBe(false);
      expect(first.registry).toBeNull();
      expect(first.upstream).toBeNull();
      expect(output.upstream).toBeNull();
      expect(source.listeners).toEqual([]);
    });

    it('should reject removing unknown nodes', () => {
      expect(violationKind(() => registry.remove(first))).toBe('unknown-node');
    });
  });

  describe('edges', () => {
    it('should send a full invalidation to a node gaining an upstream', () => {
      registry.connect(first, source);

      expect(first.pendingFlags.upstreamChanged).toBe(true);
      expect(first.pendingFlags.inputHistoryInvalid).toBe(true);
    });

    it('should request reinitialization when an initialized node changes upstream', () => {
      registry.connect(first, source);
      registry.connect(second, source);
      source.chainInitialize();

      registry.connect(second, first);

      expect(second.lifecycleState).toBe(NodeLifecycleState.PENDING_REINITIALIZE);
      expect(second.upstream).toBe(first);
      expect(source.listeners).toEqual([first]);
      expect(first.listeners).toEqual([second]);
    });

    it('should ignore reconnecting to the same upstream', () => {
      registry.connect(first, source);
      source.chainInitialize();

      registry.connect(first, source);

      expect(first.lifecycleState).toBe(NodeLifecycleState.INITIALIZED);
    });

    it('should reject cycles', () => {
      registry.connect(second, first);

      expect(violationKind(() => registry.connect(first, second))).toBe('cycle');
      expect(violationKind(() => registry.connect(first, first))).toBe('cycle');
      expect(first.upstream).toBeNull();
    });

    it('should reject edges that break the chain roles', () => {
      expect(violationKind(() => registry.connect(source, first))).toBe('invalid-edge');
      expect(violationKind(() => registry.connect(first, output))).toBe('invalid-edge');
    });
  });

  describe('traversal', () => {
    beforeEach(() => {
      registry.add(source);
      registry.connect(first, source);
      registry.connect(second, source);
      registry.connect(output, first);
    });

    it('should order upstream nodes before their listeners', () => {
      expect(registry.topologicalOrder().map(node => node.id)).toEqual([
        'src',
        'first',
        'out',
        'second',
      ]);
      expect(registry.isAcyclic()).toBe(true);
    });

    it('should deliver messages to every listener', () => {
      source.chainInitialize();

      registry.deliver(source, new Message(true, false));

      expect(first.pendingFlags.upstreamChanged).toBe(true);
      expect(second.pendingFlags.upstreamChanged).toBe(true);
      expect(output.pendingFlags.upstreamChanged).toBe(false);
    });

    it('should list nodes in insertion order', () => {
      expect(registry.getNodes().map(node => node.id)).toEqual(['src', 'first', 'second', 'out']);
      expect(registry.get('second')).toBe(second);
    });
  });
});
