import { describe, it, expect } from 'vitest';
import { at, recordingLog } from '../tests/fixtures';
import { ActiveTransformBits } from '../geometry/transform-set';
import { DIRECTIVE_NAMES, dispatchAll, dispatchDirective } from './dispatch';
import { APIState, SceneBuilder } from './scene-builder';

function newBuilder() {
  return new SceneBuilder({ logHandler: recordingLog().handler });
}

describe('dispatch', () => {
  it('should know the scene-file keywords', () => {
    expect(DIRECTIVE_NAMES).toContain('PixelFilter');
    expect(DIRECTIVE_NAMES).toContain('ActiveTransform');
    expect(DIRECTIVE_NAMES).not.toContain('pixelFilter');
  });

  it('should replay calls in order', () => {
    const builder = newBuilder();
    dispatchAll(builder, [
      { name: 'LookAt', args: [0, 0, 5, 0, 0, 0, 0, 1, 0], loc: at(1) },
      { name: 'Camera', args: ['perspective', [{ type: 'float', name: 'fov', numbers: [45] }]], loc: at(2) },
      { name: 'WorldBegin', loc: at(3) },
      { name: 'Shape', args: ['sphere', []], loc: at(4) },
      { name: 'WorldEnd', loc: at(5) },
    ]);
    expect(builder.scene.camera?.parameters.getOneFloat('fov', 90)).toBe(45);
    expect(builder.scene.shapes).toHaveLength(1);
    expect(builder.scene.shapes[0].loc).toEqual(at(4));
    expect(builder.apiState).toBe(APIState.Uninitialized);
  });

  it('should map ActiveTransform keywords', () => {
    const builder = newBuilder();
    dispatchDirective(builder, { name: 'ActiveTransform', args: ['EndTime'] });
    expect(builder.graphicsState.activeTransformBits).toBe(ActiveTransformBits.End);
    dispatchDirective(builder, { name: 'ActiveTransform', args: ['All'] });
    expect(builder.graphicsState.activeTransformBits).toBe(ActiveTransformBits.All);
  });

  it('should use a single medium name for both sides', () => {
    const builder = newBuilder();
    dispatchDirective(builder, { name: 'MediumInterface', args: ['fog'] });
    expect(builder.graphicsState).toMatchObject({ insideMedium: 'fog', outsideMedium: 'fog' });
    dispatchDirective(builder, { name: 'MediumInterface', args: ['glass', 'air'] });
    expect(builder.graphicsState).toMatchObject({ insideMedium: 'glass', outsideMedium: 'air' });
  });

  it('should reject unknown directives', () => {
    expect(() => dispatchDirective(newBuilder(), { name: 'Sphere', loc: at(1) })).toThrow(
      'scene.pbrt:1:1: unknown directive "Sphere"'
    );
    expect(() => dispatchDirective(newBuilder(), { name: 'Bogus' })).toThrow('<unknown>:0:0: unknown directive "Bogus"');
  });

  it('should not treat inherited object members as directives', () => {
    expect(() => dispatchDirective(newBuilder(), { name: 'constructor', loc: at(1) })).toThrow(
      'scene.pbrt:1:1: unknown directive "constructor"'
    );
    expect(() => dispatchDirective(newBuilder(), { name: 'hasOwnProperty', loc: at(2) })).toThrow(
      'scene.pbrt:2:1: unknown directive "hasOwnProperty"'
    );
  });

  it('should reject bad arguments before touching the interpreter', () => {
    const builder = newBuilder();
    const before = builder.graphicsState;
    expect(() => dispatchDirective(builder, { name: 'Translate', args: [1, 2], loc: at(2) })).toThrow(
      'scene.pbrt:2:1: Translate: invalid arguments'
    );
    expect(() => dispatchDirective(builder, { name: 'Transform', args: [[1, 0, 0]], loc: at(3) })).toThrow(
      'scene.pbrt:3:1: Transform: invalid arguments'
    );
    expect(() => dispatchDirective(builder, { name: 'ActiveTransform', args: ['Middle'], loc: at(4) })).toThrow(
      'scene.pbrt:4:1: ActiveTransform: invalid arguments'
    );
    expect(builder.graphicsState).toBe(before);
  });

  it('should reject calls without a name', () => {
    expect(() => dispatchDirective(newBuilder(), { args: [] })).toThrow('Malformed directive call: name:');
  });
});
