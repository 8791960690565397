import * as THREE from 'three';
import { Ray } from './Ray';
import type { Rng } from './Random';
import { computeImageHeight, type RenderOptions } from './RenderOptions';
import { randomInUnitDisk, toVector3 } from './VectorMath';

export type CameraOptions = Pick<RenderOptions,
    'imageWidth' | 'aspectRatio' | 'vfov' | 'lookFrom' | 'lookAt' | 'vup' | 'defocusAngle' | 'focusDist'>;

function degreesToRadians(degrees: number): number {
    return degrees * Math.PI / 180;
}

/**
 * Camera - thin-lens camera geometry
 *
 * Pixel (0, 0) is the upper-left corner of the image; `i` grows to the right and
 * `j` grows downwards.
 */
export class Camera {
    readonly imageWidth: number;
    readonly imageHeight: number;
    readonly center: THREE.Vector3;

    // Camera frame: u = right, v = up, w = opposite of the view direction
    readonly u: THREE.Vector3;
    readonly v: THREE.Vector3;
    readonly w: THREE.Vector3;

    readonly pixel00: THREE.Vector3;        // Centre of pixel (0, 0)
    readonly pixelDeltaU: THREE.Vector3;    // Offset to the pixel on the right
    readonly pixelDeltaV: THREE.Vector3;    // Offset to the pixel below

    readonly defocusAngle: number;
    readonly defocusDiskU: THREE.Vector3;
    readonly defocusDiskV: THREE.Vector3;

    constructor(options: CameraOptions) {
        this.imageWidth = options.imageWidth;
        this.imageHeight = computeImageHeight(options.imageWidth, options.aspectRatio);
        this.center = toVector3(options.lookFrom);
        this.defocusAngle = options.defocusAngle;

        // Viewport size at the focus plane
        const theta = degreesToRadians(options.vfov);
        const viewportHeight = 2 * Math.tan(theta / 2) * options.focusDist;
        const viewportWidth = viewportHeight * (this.imageWidth / this.imageHeight);

        this.w = this.center.clone().sub(toVector3(options.lookAt)).normalize();
        this.u = new THREE.Vector3().crossVectors(toVector3(options.vup), this.w).normalize();
        this.v = new THREE.Vector3().crossVectors(this.w, this.u);

        // Vectors across the horizontal and down the vertical viewport edges
        const viewportU = this.u.clone().multiplyScalar(viewportWidth);
        const viewportV = this.v.clone().multiplyScalar(-viewportHeight);

        this.pixelDeltaU = viewportU.clone().divideScalar(this.imageWidth);
        this.pixelDeltaV = viewportV.clone().divideScalar(this.imageHeight);

        const viewportUpperLeft = this.center.clone()
            .sub(this.w.clone().multiplyScalar(options.focusDist))
            .sub(viewportU.clone().multiplyScalar(0.5))
            .sub(viewportV.clone().multiplyScalar(0.5));

        this.pixel00 = viewportUpperLeft.add(
            this.pixelDeltaU.clone().add(this.pixelDeltaV).multiplyScalar(0.5)
        );

        const defocusRadius = options.focusDist * Math.tan(degreesToRadians(options.defocusAngle / 2));
        this.defocusDiskU = this.u.clone().multiplyScalar(defocusRadius);
        this.defocusDiskV = this.v.clone().multiplyScalar(defocusRadius);
    }

    getImageWidth(): number {
        return this.imageWidth;
    }

    getImageHeight(): number {
        return this.imageHeight;
    }

    /**
     * Ray through a random point of pixel (i, j) (box filter), starting on the
     * defocus disk when depth of field is enabled.
     */
    getRay(rng: Rng, i: number, j: number): Ray {
        const offsetX = rng.uniformF64() - 0.5;
        const offsetY = rng.uniformF64() - 0.5;

        const pixelSample = this.pixel00.clone()
            .add(this.pixelDeltaU.clone().multiplyScalar(i + offsetX))
            .add(this.pixelDeltaV.clone().multiplyScalar(j + offsetY));

        const origin = this.defocusAngle <= 0 ? this.center.clone() : this.sampleDefocusDisk(rng);

        return new Ray(origin, pixelSample.sub(origin));
    }

    private sampleDefocusDisk(rng: Rng): THREE.Vector3 {
        const p = randomInUnitDisk(rng);
        return this.center.clone()
            .add(this.defocusDiskU.clone().multiplyScalar(p.x))
            .add(this.defocusDiskV.clone().multiplyScalar(p.y));
    }
}
