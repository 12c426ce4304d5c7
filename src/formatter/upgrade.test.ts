import { describe, it, expect } from 'vitest';
import { at, param, recordingLog } from '../tests/fixtures';
import { makeParameter } from '../ir/parameters';
import { SceneFormatter } from './scene-formatter';

function upgrader() {
  const log = recordingLog();
  const formatter = new SceneFormatter({ upgrade: true, logHandler: log.handler });
  return { f: formatter, log: log.entries };
}

describe('upgrade', () => {
  describe('options block', () => {
    it('should rename legacy film and sampler types', () => {
      const { f } = upgrader();
      f.film('image', [], at(1));
      f.sampler('lowdiscrepancy', [param('integer', 'pixelsamples', 16)], at(2));
      f.sampler('maxmindist', [], at(3));
      expect(f.output).toBe(
        'Film "rgb"\n' +
          'Sampler "paddedsobol"\n' +
          '    "integer pixelsamples" [ 16 ]\n' +
          'Sampler "pmj02bn"\n'
      );
    });

    it('should convert filter widths to radii and alpha to sigma', () => {
      const { f } = upgrader();
      f.pixelFilter('gaussian', [param('float', 'alpha', 2), param('float', 'xwidth', 2)], at(1));
      expect(f.output).toBe('PixelFilter "gaussian"\n    "float xradius" [ 2 ]\n    "float sigma" [ 0.5 ]\n');
    });

    it('should turn directlighting into a one-bounce path integrator', () => {
      const { f } = upgrader();
      f.integrator('directlighting', [param('string', 'lightsamplestrategy', 'spatial')], at(1));
      expect(f.output).toBe(
        'Integrator "path"\n    "string lightsamplestrategy" [ "bvh" ]\n    "integer maxdepth" [ 1 ]\n'
      );
    });

    it('should rename sppm iteration parameters', () => {
      const { f } = upgrader();
      f.integrator(
        'sppm',
        [param('integer', 'numiterations', 64), param('integer', 'imagewritefrequency', 10), param('float', 'radius', 0.1)],
        at(1)
      );
      expect(f.output).toBe('Integrator "sppm"\n    "integer iterations" [ 64 ]\n    "float radius" [ 0.1 ]\n');
    });

    it('should map the environment camera to an equirect spherical one', () => {
      const { f } = upgrader();
      f.camera('environment', [], at(1));
      expect(f.output).toBe('Camera "spherical"\n    "string mapping" [ "equirect" ]\n');
    });
  });

  describe('materials', () => {
    it('should upgrade matte to diffuse', () => {
      const { f } = upgrader();
      f.attributeBegin(at(1));
      f.material('matte', [param('rgb', 'Kd', 0.5, 0.5, 0.5)], at(2));
      expect(f.output).toBe('\nAttributeBegin\n    Material "diffuse"\n        "rgb reflectance" [ 0.5 0.5 0.5 ]\n');
    });

    it('should warn when plastic loses its specular color', () => {
      const { f, log } = upgrader();
      f.material(
        'plastic',
        [param('rgb', 'Ks', 0.5, 0.5, 0.5), param('rgb', 'Kd', 0.2, 0.3, 0.4), param('float', 'roughness', 0.1)],
        at(3)
      );
      expect(f.output).toBe('Material "coateddiffuse"\n    "rgb reflectance" [ 0.2 0.3 0.4 ]\n    "float roughness" [ 0.1 ]\n');
      expect(log).toEqual([
        {
          level: 'warning',
          message: 'Parameter is being removed when converting to "coateddiffuse" material: "rgb Ks" [ 0.5 0.5 0.5 ]',
          loc: at(3),
        },
      ]);
    });

    it('should reduce uber without specular to diffuse', () => {
      const { f, log } = upgrader();
      f.material('uber', [param('rgb', 'Ks', 0, 0, 0), param('rgb', 'Kd', 0.2, 0.3, 0.4), param('float', 'roughness', 0.2)], at(1));
      expect(f.output).toBe('Material "diffuse"\n    "rgb reflectance" [ 0.2 0.3 0.4 ]\n');
      expect(log).toHaveLength(0);
    });

    it('should refuse a translucent uber', () => {
      const { f } = upgrader();
      expect(() => f.material('uber', [param('rgb', 'opacity', 0.5, 0.5, 0.5)], at(4))).toThrow(
        'scene.pbrt:4:1: A non-opaque "opacity" in the "uber" material is not supported. Please edit the file manually.'
      );
    });

    it('should turn the glass index into eta', () => {
      const { f } = upgrader();
      f.material('glass', [param('float', 'index', 1.5)], at(1));
      expect(f.output).toBe('Material "dielectric"\n    "float eta" [ 1.5 ]\n');
    });

    it('should refuse glass with both index and eta', () => {
      const { f } = upgrader();
      expect(() => f.material('glass', [param('float', 'index', 1.5), param('float', 'eta', 1.3)], at(2))).toThrow(
        'scene.pbrt:2:1: Material "glass" has both "index" and "eta" parameters.'
      );
    });

    it('should average a colored mix amount', () => {
      const { f, log } = upgrader();
      f.material('mix', [param('rgb', 'amount', 0.25, 0.5, 0.75), param('string', 'materials', 'a', 'b')], at(5));
      expect(f.output).toBe('Material "mix"\n    "float amount" [ 0.5 ]\n    "string materials" [ "a" "b" ]\n');
      expect(log[0].message).toBe('Changing RGB "amount" (0.25, 0.5, 0.75) to scalar average 0.5');
    });

    it('should make mirror a smooth silver conductor', () => {
      const { f } = upgrader();
      f.material('mirror', [], at(1));
      expect(f.output).toBe(
        'Material "conductor"\n' +
          '    "float roughness" [ 0 ]\n' +
          '    "spectrum eta" [ "metal-Ag-eta" ]\n' +
          '    "spectrum k" [ "metal-Ag-k" ]\n'
      );
    });

    it('should move the material type of named materials first', () => {
      const { f } = upgrader();
      f.makeNamedMaterial('red', [param('string', 'type', 'matte'), param('rgb', 'Kd', 0.5, 0.5, 0.5)], at(1));
      expect(f.output).toBe(
        'MakeNamedMaterial "red"\n    "string type" [ "diffuse" ]\n    "rgb reflectance" [ 0.5 0.5 0.5 ]\n'
      );
    });
  });

  describe('textures', () => {
    it('should collapse a constant rgb operand of a scale texture', () => {
      const { f } = upgrader();
      f.texture('t', 'spectrum', 'scale', [param('texture', 'tex1', 'checks'), param('rgb', 'tex2', 2, 2, 2)], at(1));
      expect(f.output).toBe('Texture "t" "spectrum" "scale"\n    "texture tex" [ "checks" ]\n    "float scale" [ 2 ]\n');
    });

    it('should rename float scale operands', () => {
      const { f } = upgrader();
      f.texture('t', 'float', 'scale', [param('float', 'tex1', 0.5), param('texture', 'tex2', 'noise')], at(1));
      expect(f.output).toBe('Texture "t" "float" "scale"\n    "float tex" [ 0.5 ]\n    "texture scale" [ "noise" ]\n');
    });

    it('should refuse a non-constant rgb scale operand', () => {
      const { f } = upgrader();
      const tex1 = makeParameter('rgb', 'tex1', [1, 2, 3], at(6));
      expect(() => f.texture('t', 'spectrum', 'scale', [tex1], at(6))).toThrow(
        'scene.pbrt:6:1: Non-constant "rgb" value found for "scale" texture parameter "tex1". Please manually edit the file to upgrade.'
      );
    });

    it('should rename image map parameters and the color type', () => {
      const { f } = upgrader();
      f.texture(
        'img',
        'color',
        'imagemap',
        [param('string', 'filename', 'wood.png'), param('bool', 'trilinear', true), param('bool', 'gamma', false), param('float', 'scale', 2)],
        at(1)
      );
      expect(f.output).toBe(
        'Texture "img" "spectrum" "imagemap"\n' +
          '    "string filter" [ "trilinear" ]\n' +
          '    "string imagefile" [ "wood.png" ]\n' +
          '    "string encoding" [ "linear" ]\n' +
          '    "float scale" [ 2 ]\n'
      );
    });

    it('should turn a float gamma into a gamma encoding', () => {
      const { f } = upgrader();
      f.texture('img', 'float', 'ptex', [param('float', 'gamma', 2.2)], at(1));
      expect(f.output).toBe('Texture "img" "float" "ptex"\n    "string encoding" [ "gamma 2.2" ]\n');
    });
  });

  describe('lights', () => {
    it('should fold a constant rgb scale into a float scale', () => {
      const { f } = upgrader();
      f.lightSource('point', [param('rgb', 'scale', 2, 2, 2), param('rgb', 'I', 1, 1, 1)], at(1));
      expect(f.output).toBe('LightSource "point"\n    "float scale" [ 2 ]\n    "rgb I" [ 1 1 1 ]\n');
    });

    it('should refuse a colored scale', () => {
      const { f } = upgrader();
      const scale = makeParameter('rgb', 'scale', [1, 2, 3], at(7));
      expect(() => f.lightSource('point', [scale], at(8))).toThrow(
        'scene.pbrt:7:1: "scale" is now a "float" parameter to light sources. Please modify your scene file manually.'
      );
    });

    it('should move the legacy blackbody scale into scale', () => {
      const { f } = upgrader();
      f.lightSource(
        'distant',
        [param('blackbody', 'L', 5500, 3), param('float', 'scale', 2), param('integer', 'nsamples', 4)],
        at(1)
      );
      expect(f.output).toBe('LightSource "distant"\n    "blackbody L" [ 5500 ]\n    "float scale" [ 6 ]\n');
    });

    it('should fold a constant L of a mapped infinite light into scale', () => {
      const { f } = upgrader();
      f.lightSource('infinite', [param('string', 'mapname', 'sky.exr'), param('rgb', 'L', 0.5, 0.5, 0.5)], at(1));
      expect(f.output).toBe('LightSource "infinite"\n    "string imagefile" [ "sky.exr" ]\n    "float scale" [ 0.5 ]\n');
    });

    it('should refuse a colored L with a map', () => {
      const { f } = upgrader();
      expect(() =>
        f.lightSource('infinite', [param('string', 'mapname', 'sky.exr'), param('rgb', 'L', 1, 0.5, 0.5)], at(1))
      ).toThrow('Non-constant "L" is no longer supported with "mapname" for the "infinite" light source.');
    });

    it('should rename area lights to diffuse', () => {
      const { f } = upgrader();
      f.areaLightSource('area', [param('rgb', 'L', 1, 1, 1), param('integer', 'nsamples', 4)], at(1));
      expect(f.output).toBe('AreaLightSource "diffuse"\n    "rgb L" [ 1 1 1 ]\n');
    });
  });

  describe('shapes', () => {
    it('should drop trivial indices and convert uv floats to points', () => {
      const { f } = upgrader();
      f.shape(
        'trianglemesh',
        [
          param('integer', 'indices', 0, 1, 2),
          param('point3', 'P', 0, 0, 0, 1, 0, 0, 1, 1, 0),
          param('float', 'uv', 0, 0, 1, 0, 1, 1),
          param('bool', 'discarddegenerateUVs', true),
        ],
        at(1)
      );
      expect(f.output).toBe('Shape "trianglemesh"\n    "point2 uv" [ 0 0 1 0 1 1 ]\n    "point3 P" [ 0 0 0 1 0 0 1 1 0 ]\n');
    });

    it('should rename subdivision levels and ply files', () => {
      const { f } = upgrader();
      f.shape('loopsubdiv', [param('integer', 'nlevels', 3)], at(1));
      f.shape('plymesh', [param('string', 'filename', 'bunny.ply')], at(2));
      expect(f.output).toBe(
        'Shape "loopsubdiv"\n    "integer levels" [ 3 ]\n' + 'Shape "plymesh"\n    "string plyfile" [ "bunny.ply" ]\n'
      );
    });

    it('should turn a bump map into a displacement texture', () => {
      const { f } = upgrader();
      f.shape('sphere', [param('texture', 'bumpmap', 'bumps')], at(1));
      expect(f.output).toBe('Shape "sphere"\n    "texture displacement" [ "bumps" ]\n');
    });
  });
});
