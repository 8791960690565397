import * as THREE from 'three'
import { Scene } from './Scene'
import { Sphere } from '../core/Sphere'
import { Rng, type Seed } from '../core/Random'
import { dielectric, lambertian, metal, type Material } from '../core/Material'
import type { RenderOptionsInput } from '../core/RenderOptions'
import { SCENE_CONFIG } from '../utils/Constants'
import { Logger } from '../utils/Logger'

export type SceneName = 'demo' | 'random'

export const SCENE_NAMES: readonly SceneName[] = ['demo', 'random']

/**
 * Ground, diffuse centre ball, glass ball with an air bubble and a fuzzy gold metal.
 */
export function createDemoScene(): Scene {
    const materialGround = lambertian({ r: 0.8, g: 0.8, b: 0.0 })
    const materialCenter = lambertian({ r: 0.1, g: 0.2, b: 0.5 })
    const materialLeft = dielectric(1.5)
    const materialBubble = dielectric(1.0 / 1.5)
    const materialRight = metal({ r: 0.8, g: 0.6, b: 0.2 }, 1.0)

    const scene = new Scene()
        .add(new Sphere(new THREE.Vector3(0, -100.5, -1), 100, materialGround))
        .add(new Sphere(new THREE.Vector3(0, 0, -1.2), 0.5, materialCenter))
        .add(new Sphere(new THREE.Vector3(-1, 0, -1), 0.5, materialLeft))
        .add(new Sphere(new THREE.Vector3(-1, 0, -1), 0.4, materialBubble))
        .add(new Sphere(new THREE.Vector3(1, 0, -1), 0.5, materialRight))

    Logger.getInstance().scene(`Demo scene created: ${scene.getSphereCount()} spheres`)
    return scene
}

/**
 * Grid of small random spheres around three large feature spheres.
 * Deterministic for a given seed.
 */
export function createRandomScene(seed: Seed): Scene {
    const rng = new Rng(seed)
    const config = SCENE_CONFIG.RANDOM
    const scene = new Scene()

    scene.add(new Sphere(new THREE.Vector3(0, -1000, 0), 1000, lambertian({ r: 0.5, g: 0.5, b: 0.5 })))

    const glass = dielectric(config.GLASS_INDEX)
    const keepClear = new THREE.Vector3(4, 0.2, 0)

    for (let a = -config.GRID_EXTENT; a < config.GRID_EXTENT; a++) {
        for (let b = -config.GRID_EXTENT; b < config.GRID_EXTENT; b++) {
            const chooseMaterial = rng.uniformF64()
            const center = new THREE.Vector3(
                a + 0.9 * rng.uniformF64(),
                config.SMALL_RADIUS,
                b + 0.9 * rng.uniformF64()
            )

            if (center.distanceTo(keepClear) <= 0.9) {
                continue
            }

            let material: Material
            if (chooseMaterial < config.DIFFUSE_PROBABILITY) {
                material = lambertian({
                    r: rng.uniformF64() * rng.uniformF64(),
                    g: rng.uniformF64() * rng.uniformF64(),
                    b: rng.uniformF64() * rng.uniformF64()
                })
            } else if (chooseMaterial < config.DIFFUSE_PROBABILITY + config.METAL_PROBABILITY) {
                material = metal({
                    r: rng.uniformF64Range(0.5, 1),
                    g: rng.uniformF64Range(0.5, 1),
                    b: rng.uniformF64Range(0.5, 1)
                }, rng.uniformF64Range(0, 0.5))
            } else {
                material = glass
            }

            scene.add(new Sphere(center, config.SMALL_RADIUS, material))
        }
    }

    scene.add(new Sphere(new THREE.Vector3(0, 1, 0), 1.0, glass))
    scene.add(new Sphere(new THREE.Vector3(-4, 1, 0), 1.0, lambertian({ r: 0.4, g: 0.2, b: 0.1 })))
    scene.add(new Sphere(new THREE.Vector3(4, 1, 0), 1.0, metal({ r: 0.7, g: 0.6, b: 0.5 }, 0.0)))

    Logger.getInstance().scene(`Random scene created: ${scene.getSphereCount()} spheres`)
    return scene
}

export function createScene(name: SceneName, seed: Seed): Scene {
    switch (name) {
        case 'demo':
            return createDemoScene()
        case 'random':
            return createRandomScene(seed)
    }
}

/**
 * Camera that frames each built-in scene. The demo scene uses the defaults.
 */
export function getCameraPreset(name: SceneName): RenderOptionsInput {
    switch (name) {
        case 'demo':
            return {}
        case 'random':
            return {
                vfov: 20,
                lookFrom: { x: 13, y: 2, z: 3 },
                lookAt: { x: 0, y: 0, z: 0 },
                vup: { x: 0, y: 1, z: 0 },
                defocusAngle: 0.6,
                focusDist: 10
            }
    }
}

export function isSceneName(value: string): value is SceneName {
    return SCENE_NAMES.some(name => name === value)
}
