import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { PNG } from "pngjs";

export type Rgba = [number, number, number, number];
export type PixelFill = Rgba | ((x: number, y: number) => Rgba);

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `cardsheet-test-${prefix}-`));
}

export async function writePng(filePath: string, width: number, height: number, fill: PixelFill = [200, 40, 40, 255]) {
  const png = new PNG({ width, height });
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const [r, g, b, a] = typeof fill === "function" ? fill(x, y) : fill;
      const offset = (y * width + x) * 4;
      png.data[offset] = r;
      png.data[offset + 1] = g;
      png.data[offset + 2] = b;
      png.data[offset + 3] = a;
    }
  }

  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, PNG.sync.write(png));
  return filePath;
}
