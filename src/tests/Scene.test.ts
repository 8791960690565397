import * as THREE from 'three';
import { describe, expect, it } from 'vitest';
import { Ray } from '../core/Ray';
import { Sphere } from '../core/Sphere';
import { lambertian, metal } from '../core/Material';
import { Scene } from '../scene/Scene';
import { createDemoScene, createRandomScene } from '../scene/SceneFactory';

const diffuse = lambertian({ r: 0.5, g: 0.5, b: 0.5 });

function ray(origin: [number, number, number], direction: [number, number, number]): Ray {
    return new Ray(new THREE.Vector3(...origin), new THREE.Vector3(...direction));
}

describe('Sphere.hit', () => {
    const sphere = new Sphere(new THREE.Vector3(0, 0, -1), 0.5, diffuse);

    it('returns the near root with an outward facing normal', () => {
        const hit = sphere.hit(ray([0, 0, 0], [0, 0, -1]), 0.001, Infinity);

        expect(hit).not.toBeNull();
        expect(hit?.t).toBe(0.5);
        expect(hit?.point.toArray()).toEqual([0, 0, -0.5]);
        expect(hit?.normal.toArray()).toEqual([0, 0, 1]);
        expect(hit?.frontFace).toBe(true);
        expect(hit?.material).toBe(diffuse);
    });

    it('falls back to the far root from inside and flips the normal', () => {
        const hit = sphere.hit(ray([0, 0, -1], [0, 0, -1]), 0.001, Infinity);

        expect(hit?.t).toBe(0.5);
        expect(hit?.point.toArray()).toEqual([0, 0, -1.5]);
        expect(hit?.frontFace).toBe(false);
        expect(hit?.normal.z).toBe(1);
        expect(hit?.normal.lengthSq()).toBe(1);
    });

    it('misses rays that point away from the sphere', () => {
        expect(sphere.hit(ray([0, 0, 0], [0, 0, 1]), 0.001, Infinity)).toBeNull();
        expect(sphere.hit(ray([2, 0, 0], [1, 0, 0]), 0.001, Infinity)).toBeNull();
        expect(sphere.hit(ray([0, 3, -1], [0, 1, 0]), 0.001, Infinity)).toBeNull();
    });

    it('only accepts roots strictly inside (tMin, tMax)', () => {
        expect(sphere.hit(ray([0, 0, 0], [0, 0, -1]), 0.001, 0.5)).toBeNull();
        expect(sphere.hit(ray([0, 0, 0], [0, 0, -1]), 0.5, Infinity)?.t).toBe(1.5);
        expect(sphere.hit(ray([0, 0, 0], [0, 0, -1]), 1.5, Infinity)).toBeNull();
    });

    it('is idempotent', () => {
        const r = ray([0.1, 0.2, 0.3], [-0.05, -0.21, -1.3]);
        const first = sphere.hit(r, 0.001, Infinity);
        const second = sphere.hit(r, 0.001, Infinity);

        expect(first).not.toBeNull();
        expect(Object.is(first?.t, second?.t)).toBe(true);
    });

    it('rejects non-positive radii', () => {
        expect(() => new Sphere(new THREE.Vector3(), 0, diffuse)).toThrow();
        expect(() => new Sphere(new THREE.Vector3(), -1, diffuse)).toThrow();
    });
});

describe('Scene', () => {
    it('returns the nearest hit regardless of insertion order', () => {
        const near = lambertian({ r: 1, g: 0, b: 0 });
        const far = lambertian({ r: 0, g: 1, b: 0 });
        const scene = new Scene()
            .add(new Sphere(new THREE.Vector3(0, 0, -3), 0.5, far))
            .add(new Sphere(new THREE.Vector3(0, 0, -1), 0.5, near));

        const hit = scene.hit(ray([0, 0, 0], [0, 0, -1]), 0.001, Infinity);
        expect(hit?.t).toBe(0.5);
        expect(hit?.material).toBe(near);
    });

    it('returns null for an empty scene', () => {
        expect(new Scene().hit(ray([0, 0, 0], [0, 0, -1]), 0.001, Infinity)).toBeNull();
    });

    it('refuses new spheres once frozen', () => {
        const scene = new Scene().add(new Sphere(new THREE.Vector3(0, 0, -1), 0.5, diffuse));
        scene.freeze();

        expect(scene.isFrozen()).toBe(true);
        expect(() => scene.add(new Sphere(new THREE.Vector3(0, 0, -2), 0.5, diffuse))).toThrow(/frozen/);
        expect(scene.getSphereCount()).toBe(1);
    });

    it('keeps shared materials shared through the descriptor', () => {
        const gold = metal({ r: 0.8, g: 0.6, b: 0.2 }, 0.25);
        const scene = new Scene()
            .add(new Sphere(new THREE.Vector3(1, 0, -1), 0.5, gold))
            .add(new Sphere(new THREE.Vector3(-1, 0, -1), 0.5, gold))
            .add(new Sphere(new THREE.Vector3(0, -100.5, -1), 100, diffuse));

        const descriptor = scene.toDescriptor();
        expect(descriptor.materials).toHaveLength(2);
        expect(descriptor.materials[0]).toEqual({ kind: 'metal', albedo: { r: 0.8, g: 0.6, b: 0.2 }, fuzz: 0.25 });
        expect(descriptor.spheres.map(s => s.material)).toEqual([0, 0, 1]);

        const rebuilt = Scene.fromDescriptor(descriptor);
        const spheres = rebuilt.getSpheres();
        expect(rebuilt.isFrozen()).toBe(true);
        expect(spheres).toHaveLength(3);
        expect(spheres[0].material).toBe(spheres[1].material);
        expect(spheres[2].center.toArray()).toEqual([0, -100.5, -1]);
        expect(spheres[2].radius).toBe(100);
    });

    it('survives structured cloning of the descriptor', () => {
        const descriptor = createDemoScene().toDescriptor();
        const rebuilt = Scene.fromDescriptor(structuredClone(descriptor));

        expect(rebuilt.toDescriptor()).toEqual(descriptor);
    });

    it('rejects descriptors that reference unknown materials', () => {
        expect(() => Scene.fromDescriptor({
            materials: [],
            spheres: [{ center: { x: 0, y: 0, z: 0 }, radius: 1, material: 0 }]
        })).toThrow(/unknown material/);
    });
});

describe('SceneFactory', () => {
    it('builds the five-sphere demo scene', () => {
        const scene = createDemoScene();
        expect(scene.getSphereCount()).toBe(5);
        expect(scene.getMaterialCount()).toBe(5);
        expect(scene.getSpheres()[0].radius).toBe(100);
    });

    it('builds the same random scene for the same seed', () => {
        const a = createRandomScene(99).toDescriptor();
        const b = createRandomScene(99).toDescriptor();
        const c = createRandomScene(100).toDescriptor();

        expect(a).toEqual(b);
        expect(a).not.toEqual(c);
        expect(a.spheres.length).toBeGreaterThan(4);
    });
});
