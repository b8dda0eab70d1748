import { MathUtils } from 'three';
import { SeededRandom } from './SeededRandom';

// Edge midpoints of a cube, 12 gradients
const GRAD3 = new Float32Array([
  1, 1, 0, -1, 1, 0, 1, -1, 0, -1, -1, 0,
  1, 0, 1, -1, 0, 1, 1, 0, -1, -1, 0, -1,
  0, 1, 1, 0, -1, 1, 0, 1, -1, 0, -1, -1
]);

/**
 * Seeded 3D gradient (Perlin) noise.
 * Terrain samples a 2D plane of it: the third axis carries the world seed,
 * so one permutation table can serve several worlds.
 */
export class PerlinNoise {
  private permutation: Uint8Array;

  constructor(seed: number) {
    this.permutation = new Uint8Array(512);

    const rng = new SeededRandom(seed);
    const p = new Uint8Array(256);
    for (let i = 0; i < 256; i++) p[i] = i;

    // Fisher-Yates shuffle
    for (let i = 255; i > 0; i--) {
      const j = Math.floor(rng.next() * (i + 1));
      const tmp = p[i];
      p[i] = p[j];
      p[j] = tmp;
    }

    for (let i = 0; i < 512; i++) {
      this.permutation[i] = p[i & 255];
    }
  }

  private fade(t: number): number {
    return t * t * t * (t * (t * 6 - 15) + 10);
  }

  private grad(hash: number, x: number, y: number, z: number): number {
    const g = (hash % 12) * 3;
    return GRAD3[g] * x + GRAD3[g + 1] * y + GRAD3[g + 2] * z;
  }

  /**
   * Sample 3D noise
   * @returns Noise value between -1 and 1 (zero on integer lattice points)
   */
  noise3D(x: number, y: number, z: number): number {
    const fx = Math.floor(x);
    const fy = Math.floor(y);
    const fz = Math.floor(z);
    const X = fx & 255;
    const Y = fy & 255;
    const Z = fz & 255;
    x -= fx;
    y -= fy;
    z -= fz;

    const u = this.fade(x);
    const v = this.fade(y);
    const w = this.fade(z);

    const p = this.permutation;
    const a = p[X] + Y;
    const aa = p[a] + Z;
    const ab = p[a + 1] + Z;
    const b = p[X + 1] + Y;
    const ba = p[b] + Z;
    const bb = p[b + 1] + Z;

    const lerp = MathUtils.lerp;
    const value = lerp(
      lerp(
        lerp(this.grad(p[aa], x, y, z), this.grad(p[ba], x - 1, y, z), u),
        lerp(this.grad(p[ab], x, y - 1, z), this.grad(p[bb], x - 1, y - 1, z), u),
        v
      ),
      lerp(
        lerp(this.grad(p[aa + 1], x, y, z - 1), this.grad(p[ba + 1], x - 1, y, z - 1), u),
        lerp(this.grad(p[ab + 1], x, y - 1, z - 1), this.grad(p[bb + 1], x - 1, y - 1, z - 1), u),
        v
      ),
      w
    );

    return MathUtils.clamp(value, -1, 1);
  }
}
