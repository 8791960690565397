import * as THREE from 'three';
import { describe, expect, it } from 'vitest';
import { Ray } from '../core/Ray';
import { Rng } from '../core/Random';
import { Sphere } from '../core/Sphere';
import { lambertian } from '../core/Material';
import { Scene } from '../scene/Scene';
import { backgroundColor, rayColor } from '../rendering/Integrator';

function singleSphereScene(albedo = { r: 0.8, g: 0.2, b: 0.2 }): Scene {
    return new Scene()
        .add(new Sphere(new THREE.Vector3(0, 0, -1), 0.5, lambertian(albedo)))
        .freeze();
}

describe('backgroundColor', () => {
    it('blends from white at the bottom to sky blue at the top', () => {
        expect(backgroundColor(new THREE.Vector3(0, -1, 0)).toArray()).toEqual([1, 1, 1]);

        const top = backgroundColor(new THREE.Vector3(0, 1, 0));
        expect(top.r).toBeCloseTo(0.5, 12);
        expect(top.g).toBeCloseTo(0.7, 12);
        expect(top.b).toBe(1);

        const horizon = backgroundColor(new THREE.Vector3(0, 0, -1));
        expect(horizon.r).toBeCloseTo(0.75, 12);
        expect(horizon.g).toBeCloseTo(0.85, 12);
        expect(horizon.b).toBe(1);
    });

    it('ignores the direction length', () => {
        const a = backgroundColor(new THREE.Vector3(0.3, 0.4, -1));
        const b = backgroundColor(new THREE.Vector3(3, 4, -10));
        expect(a.r).toBeCloseTo(b.r, 12);
        expect(a.g).toBeCloseTo(b.g, 12);
    });
});

describe('rayColor', () => {
    it('returns black once the depth is exhausted', () => {
        const ray = new Ray(new THREE.Vector3(), new THREE.Vector3(0, 1, 0));
        expect(rayColor(new Rng(1), 0, ray, new Scene().freeze()).toArray()).toEqual([0, 0, 0]);
    });

    it('returns the background for a miss at any positive depth', () => {
        const scene = singleSphereScene();
        const direction = new THREE.Vector3(0.2, 0.9, 0.1);
        const expected = backgroundColor(direction);

        for (const depth of [1, 2, 50]) {
            const color = rayColor(new Rng(1), depth, new Ray(new THREE.Vector3(), direction), scene);
            expect(color.toArray()).toEqual(expected.toArray());
        }
    });

    it('returns black for a hit on the last bounce', () => {
        const ray = new Ray(new THREE.Vector3(), new THREE.Vector3(0, 0, -1));
        expect(rayColor(new Rng(1), 1, ray, singleSphereScene()).toArray()).toEqual([0, 0, 0]);
    });

    it('tints the sky by the albedo after one diffuse bounce', () => {
        const scene = singleSphereScene();
        const rng = new Rng(9);

        for (let i = 0; i < 100; i++) {
            const color = rayColor(rng, 2, new Ray(new THREE.Vector3(), new THREE.Vector3(0, 0, -1)), scene);
            expect(color.b).toBe(0.2);
            expect(color.r).toBeGreaterThanOrEqual(0.4);
            expect(color.r).toBeLessThanOrEqual(0.8);
        }
    });

    it('never mutates the material albedo', () => {
        const material = lambertian({ r: 0.8, g: 0.2, b: 0.2 });
        const scene = new Scene().add(new Sphere(new THREE.Vector3(0, 0, -1), 0.5, material)).freeze();
        const rng = new Rng(13);

        for (let i = 0; i < 20; i++) {
            rayColor(rng, 5, new Ray(new THREE.Vector3(), new THREE.Vector3(0, 0, -1)), scene);
        }

        expect(material.albedo.toArray()).toEqual([0.8, 0.2, 0.2]);
    });
});
