import { describe, it, expect, vi } from 'vitest';
import { at, recordingLog } from '../fixtures';
import { SceneFormatter } from '../../formatter/scene-formatter';
import { dispatchAll } from '../../interpreter/dispatch';
import { SceneBuilder } from '../../interpreter/scene-builder';
import type { DirectiveCallInput } from '../../ir/directive-schema';

function call(line: number, name: string, ...args: unknown[]): DirectiveCallInput {
  return { name, args, loc: at(line) };
}

function p(type: string, name: string, values: unknown[]) {
  const key = type === 'string' ? 'strings' : 'numbers';
  return { type, name, [key]: values };
}

const SCENE: DirectiveCallInput[] = [
  call(1, 'LookAt', 0, 0, 5, 0, 0, 0, 0, 1, 0),
  call(2, 'Camera', 'perspective', [p('float', 'fov', [45])]),
  call(3, 'Film', 'image', [p('string', 'filename', ['out.exr'])]),
  call(4, 'WorldBegin'),
  call(5, 'LightSource', 'infinite', [p('rgb', 'L', [0.5, 0.5, 0.5])]),
  call(6, 'MakeNamedMaterial', 'red', [p('string', 'type', ['matte']), p('rgb', 'Kd', [0.8, 0.1, 0.1])]),
  call(7, 'ObjectBegin', 'ball'),
  call(8, 'NamedMaterial', 'red'),
  call(9, 'Shape', 'sphere', [p('float', 'radius', [1])]),
  call(10, 'ObjectEnd'),
  call(11, 'AttributeBegin'),
  call(12, 'Translate', 2, 0, 0),
  call(13, 'ObjectInstance', 'ball'),
  call(14, 'AttributeEnd'),
  call(15, 'AttributeBegin'),
  call(16, 'AreaLightSource', 'area', [p('rgb', 'L', [4, 4, 4])]),
  call(17, 'Translate', 0, 3, 0),
  call(18, 'Shape', 'disk', []),
  call(19, 'AttributeEnd'),
  call(20, 'WorldEnd'),
];

describe('scene pipeline', () => {
  it('should build the entity graph', () => {
    const log = recordingLog();
    const driver = { render: vi.fn() };
    const builder = new SceneBuilder({ driver, logHandler: log.handler });
    dispatchAll(builder, SCENE);

    expect(log.entries).toHaveLength(0);
    expect(driver.render).toHaveBeenCalledTimes(1);
    const scene = builder.scene;
    expect(scene.film.name).toBe('image');
    expect(scene.lights.map(l => l.name)).toEqual(['infinite']);
    expect(scene.namedMaterials.get('red')?.parameters.getOneString('type', '')).toBe('matte');
    expect(scene.instanceDefinitions.get('ball')?.shapes[0].material).toEqual({ kind: 'name', name: 'red' });

    expect(scene.instances).toHaveLength(1);
    const stamp = scene.instances[0];
    if (stamp.kind !== 'static') throw new Error('expected a static instance');
    const [sx, sy, sz] = stamp.renderFromInstance.applyToPoint([0, 0, 0]);
    expect(sx).toBeCloseTo(2, 9);
    expect(sy).toBeCloseTo(0, 9);
    expect(sz).toBeCloseTo(0, 9);

    // Render space puts the camera at the origin.
    expect(scene.shapes).toHaveLength(1);
    const [dx, dy, dz] = scene.shapes[0].renderFromObject.applyToPoint([0, 0, 0]);
    expect(dx).toBeCloseTo(0, 9);
    expect(dy).toBeCloseTo(3, 9);
    expect(dz).toBeCloseTo(-5, 9);
    expect(scene.shapes[0].areaLightIndex).toBe(0);
    expect(scene.areaLights[0].parameters.getOneRGB('L')).toEqual({ r: 4, g: 4, b: 4 });
  });

  it('should print the upgraded scene', () => {
    const log = recordingLog();
    const formatter = new SceneFormatter({ upgrade: true, logHandler: log.handler });
    dispatchAll(formatter, SCENE);

    expect(log.entries).toHaveLength(0);
    expect(formatter.output).toBe(
      [
        'LookAt 0 0 5',
        '    0 0 0',
        '    0 1 0',
        'Camera "perspective"',
        '    "float fov" [ 45 ]',
        'Film "rgb"',
        '    "string filename" [ "out.exr" ]',
        '',
        '',
        'WorldBegin',
        '',
        'LightSource "infinite"',
        '    "rgb L" [ 0.5 0.5 0.5 ]',
        'MakeNamedMaterial "red"',
        '    "string type" [ "diffuse" ]',
        '    "rgb reflectance" [ 0.8 0.1 0.1 ]',
        'ObjectBegin "ball"',
        '    NamedMaterial "red"',
        '    Shape "sphere"',
        '        "float radius" [ 1 ]',
        'ObjectEnd',
        '',
        'AttributeBegin',
        '    Translate 2 0 0',
        '    ObjectInstance "ball"',
        'AttributeEnd',
        '',
        'AttributeBegin',
        '    AreaLightSource "diffuse"',
        '        "rgb L" [ 4 4 4 ]',
        '    Translate 0 3 0',
        '    Shape "disk"',
        'AttributeEnd',
        'WorldEnd',
        '',
      ].join('\n')
    );
  });
});
