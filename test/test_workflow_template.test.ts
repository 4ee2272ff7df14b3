/**
 * Tests render(): rule passes, seed handling, input-image pruning and
 * template immutability.
 */
import { WorkflowGraph } from '../src/core/GraphPrimitives';
import { compileRules } from '../src/core/NodeRules';
import { NodeGraph, NodeRule } from '../src/core/Types';
import { render, resolveParams, SEED_RANGE } from '../src/core/WorkflowTemplate';
import { danglingEdges } from './helpers/fakes';

const fixedSeed = () => 42;

function imageTemplate(): NodeGraph {
  return {
    '10': { class_type: 'LoadImage', inputs: { image: '' } },
    '11': { class_type: 'LoadImage', inputs: { image: '' } },
    '12': { class_type: 'LoadImage', inputs: { image: '' } },
    '20': {
      class_type: 'ImageBatch',
      inputs: { image1: ['10', 0], image2: ['11', 0], image3: ['12', 0], mode: 'stack' },
    },
    '30': { class_type: 'KSampler', inputs: { steps: 20, seed: 0, model: ['40', 0] } },
    '40': { class_type: 'CheckpointLoader', inputs: { ckpt_name: 'base.safetensors' } },
  };
}

const imageRules: NodeRule[] = [
  { kind: 'input_images', nodeIds: ['10', '11', '12'], inputKey: 'image' },
  { kind: 'seed', nodeIds: ['30'], inputKey: 'seed' },
];

describe('TestWorkflowTemplate', () => {
  /** The prompt lands in every node a prompt rule targets. */
  test('test_prompt_rule_writes_prompt', () => {
    const template: NodeGraph = { '5': { class_type: 'CLIPTextEncode', inputs: { text: '' } } };
    const rules = compileRules([{ kind: 'prompt', nodeIds: ['5'], inputKey: 'text' }]);

    const graph = render(template, rules, 'a cat', {}, fixedSeed);

    expect(graph['5'].inputs.text).toBe('a cat');
  });

  /** Surplus image nodes are removed along with every input that pointed at them. */
  test('test_input_images_prunes_surplus_nodes', () => {
    const graph = render(
      imageTemplate(),
      compileRules(imageRules),
      'x',
      { input_images: ['a.png', 'b.png'] },
      fixedSeed,
    );

    expect(graph['10'].inputs.image).toBe('a.png');
    expect(graph['11'].inputs.image).toBe('b.png');
    expect(graph['12']).toBeUndefined();
    expect(graph['20'].inputs).toEqual({ image1: ['10', 0], image2: ['11', 0], mode: 'stack' });
  });

  /** No images at all prunes every declared image node. */
  test('test_missing_input_images_prunes_all', () => {
    const graph = render(imageTemplate(), compileRules(imageRules), 'x', {}, fixedSeed);

    expect(Object.keys(graph).sort()).toEqual(['20', '30', '40']);
    expect(graph['20'].inputs).toEqual({ mode: 'stack' });
    expect(danglingEdges(new WorkflowGraph(graph))).toEqual([]);
    // edges to surviving nodes are untouched
    expect(graph['30'].inputs.model).toEqual(['40', 0]);
  });

  /** More images than nodes: only as many as there are nodes are used. */
  test('test_extra_images_are_ignored', () => {
    const graph = render(
      imageTemplate(),
      compileRules(imageRules),
      'x',
      { input_images: ['a.png', 'b.png', 'c.png', 'd.png'] },
      fixedSeed,
    );

    expect(graph['12'].inputs.image).toBe('c.png');
    expect(Object.keys(graph)).toHaveLength(6);
  });

  /** A generated seed is written through a rule keyed "seed". */
  test('test_seed_generated_when_absent', () => {
    const seedSource = jest.fn(() => 123456);
    const graph = render(imageTemplate(), compileRules(imageRules), 'x', {}, seedSource);

    expect(seedSource).toHaveBeenCalledTimes(1);
    expect(graph['30'].inputs.seed).toBe(123456);
  });

  /** A caller-supplied seed wins and no seed is drawn. */
  test('test_seed_given_is_used', () => {
    const seedSource = jest.fn(() => 1);
    const graph = render(imageTemplate(), compileRules(imageRules), 'x', { Seed: 7 }, seedSource);

    expect(seedSource).not.toHaveBeenCalled();
    expect(graph['30'].inputs.seed).toBe(7);
  });

  /** Same inputs and seed give the same graph. */
  test('test_render_is_deterministic', () => {
    const rules = compileRules(imageRules);
    const params = { input_images: ['a.png'], seed: 99 };

    expect(render(imageTemplate(), rules, 'p', params)).toEqual(render(imageTemplate(), rules, 'p', params));
  });

  /** Neither the template nor the params object changes. */
  test('test_template_not_mutated', () => {
    const template = imageTemplate();
    const before = JSON.parse(JSON.stringify(template));
    const params = { input_images: ['a.png'] };

    render(template, compileRules(imageRules), 'x', params, fixedSeed);

    expect(template).toEqual(before);
    expect(params).toEqual({ input_images: ['a.png'] });
  });

  /** Negative prompt, named text fields and scalar kinds each read their own key. */
  test('test_text_negative_and_scalar_rules', () => {
    const template: NodeGraph = {
      '1': { class_type: 'Pos', inputs: { text: '' } },
      '2': { class_type: 'Neg', inputs: { text: 'default negative' } },
      '3': { class_type: 'Caption', inputs: { value: '' } },
      '4': { class_type: 'Sampler', inputs: { steps: 20, cfg: 7 } },
    };
    const rules = compileRules([
      { kind: 'prompt', nodeIds: ['1'], inputKey: 'text' },
      { kind: 'negative_prompt', nodeIds: ['2'], inputKey: 'text' },
      { kind: 'text:caption', nodeIds: ['3'], inputKey: 'value' },
      { kind: 'Steps', nodeIds: ['4'], inputKey: 'steps' },
      { kind: 'cfg', nodeIds: ['4'], inputKey: 'cfg' },
    ]);

    const graph = render(template, rules, 'a dog', { CAPTION: 'hello', steps: 30 }, fixedSeed);

    expect(graph['1'].inputs.text).toBe('a dog');
    // absent negative_prompt leaves the template value
    expect(graph['2'].inputs.text).toBe('default negative');
    expect(graph['3'].inputs.value).toBe('hello');
    expect(graph['4'].inputs).toEqual({ steps: 30, cfg: 7 });
  });

  /** A later rule aimed at a pruned node is skipped rather than recreating it. */
  test('test_rule_on_pruned_node_is_skipped', () => {
    const rules = compileRules([
      ...imageRules,
      { kind: 'denoise', nodeIds: ['12'], inputKey: 'strength' },
    ]);

    const graph = render(imageTemplate(), rules, 'x', { input_images: ['a.png'], denoise: 0.5 }, fixedSeed);

    expect(graph['12']).toBeUndefined();
    expect(graph['11']).toBeUndefined();
  });

  /** The single input image is written where an input_image rule points. */
  test('test_input_image_rule', () => {
    const template: NodeGraph = { '7': { class_type: 'LoadImage', inputs: { image: 'placeholder.png' } } };
    const rules = compileRules([{ kind: 'input_image', nodeIds: ['7'], inputKey: 'image' }]);

    const graph = render(template, rules, '', { input_image: 'upload_1.png' }, fixedSeed);

    expect(graph['7'].inputs.image).toBe('upload_1.png');
  });
});

describe('TestResolveParams', () => {
  test('test_keys_lower_cased', () => {
    expect(resolveParams({ Steps: 3, seed: 5 })).toEqual({ steps: 3, seed: 5 });
  });

  /** Random seeds fall inside [0, 2^48). */
  test('test_random_seed_range', () => {
    const { seed } = resolveParams({});
    expect(typeof seed).toBe('number');
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThan(SEED_RANGE);
  });
});
