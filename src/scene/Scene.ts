import { Sphere } from '../core/Sphere';
import type { Ray } from '../core/Ray';
import type { HitRecord } from '../core/HitRecord';
import { dielectric, lambertian, metal, type Material } from '../core/Material';
import { toVector3, type RGBLike, type Vec3Like } from '../core/VectorMath';
import { Logger } from '../utils/Logger';

// ===== PLAIN-DATA FORM (postMessage safe) =====

export type MaterialDescriptor =
    | { kind: 'lambertian'; albedo: RGBLike }
    | { kind: 'metal'; albedo: RGBLike; fuzz: number }
    | { kind: 'dielectric'; refractionIndex: number };

export interface RaytracerSphere {
    center: Vec3Like;
    radius: number;
    material: number;           // Index into SceneDescriptor.materials
}

export interface SceneDescriptor {
    materials: MaterialDescriptor[];
    spheres: RaytracerSphere[];
}

function describeMaterial(material: Material): MaterialDescriptor {
    switch (material.kind) {
        case 'lambertian':
            return { kind: 'lambertian', albedo: { r: material.albedo.r, g: material.albedo.g, b: material.albedo.b } };
        case 'metal':
            return { kind: 'metal', albedo: { r: material.albedo.r, g: material.albedo.g, b: material.albedo.b }, fuzz: material.fuzz };
        case 'dielectric':
            return { kind: 'dielectric', refractionIndex: material.refractionIndex };
    }
}

function buildMaterial(descriptor: MaterialDescriptor): Material {
    switch (descriptor.kind) {
        case 'lambertian':
            return lambertian(descriptor.albedo);
        case 'metal':
            return metal(descriptor.albedo, descriptor.fuzz);
        case 'dielectric':
            return dielectric(descriptor.refractionIndex);
    }
}

/**
 * Scene - ordered, append-only list of spheres
 *
 * Built once, then frozen before the first render. After `freeze()` the scene is
 * read concurrently by every strip worker and must never change again.
 */
export class Scene {
    private spheres: Sphere[] = [];
    private frozen: boolean = false;
    private logger: Logger;

    constructor() {
        this.logger = Logger.getInstance();
    }

    public add(sphere: Sphere): this {
        if (this.frozen) {
            throw new Error('Scene is frozen: spheres cannot be added once rendering has started');
        }
        this.spheres.push(sphere);
        return this;
    }

    public freeze(): this {
        if (!this.frozen) {
            this.frozen = true;
            Object.freeze(this.spheres);
            this.logger.scene(`Scene frozen with ${this.spheres.length} spheres`);
        }
        return this;
    }

    public isFrozen(): boolean {
        return this.frozen;
    }

    /**
     * Nearest hit strictly inside (tMin, tMax). Linear scan, tMax shrinks to the
     * closest hit found so far.
     */
    public hit(ray: Ray, tMin: number, tMax: number): HitRecord | null {
        let closest: HitRecord | null = null;
        let closestSoFar = tMax;

        for (const sphere of this.spheres) {
            const rec = sphere.hit(ray, tMin, closestSoFar);
            if (rec) {
                closestSoFar = rec.t;
                closest = rec;
            }
        }

        return closest;
    }

    public getSphereCount(): number {
        return this.spheres.length;
    }

    public getSpheres(): readonly Sphere[] {
        return this.spheres;
    }

    public getMaterialCount(): number {
        return new Set(this.spheres.map(s => s.material)).size;
    }

    // ===== SERIALISATION =====

    /**
     * Materials are deduplicated by identity, so spheres that shared a material
     * keep sharing one after `fromDescriptor`.
     */
    public toDescriptor(): SceneDescriptor {
        const materialIndex = new Map<Material, number>();
        const materials: MaterialDescriptor[] = [];

        const spheres = this.spheres.map((sphere): RaytracerSphere => {
            let index = materialIndex.get(sphere.material);
            if (index === undefined) {
                index = materials.length;
                materialIndex.set(sphere.material, index);
                materials.push(describeMaterial(sphere.material));
            }

            return {
                center: { x: sphere.center.x, y: sphere.center.y, z: sphere.center.z },
                radius: sphere.radius,
                material: index
            };
        });

        return { materials, spheres };
    }

    public static fromDescriptor(descriptor: SceneDescriptor): Scene {
        const materials = descriptor.materials.map(buildMaterial);
        const scene = new Scene();

        for (const sphere of descriptor.spheres) {
            const material = materials[sphere.material];
            if (material === undefined) {
                throw new Error(`Sphere references unknown material #${sphere.material}`);
            }
            scene.add(new Sphere(toVector3(sphere.center), sphere.radius, material));
        }

        return scene.freeze();
    }
}
