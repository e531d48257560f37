/**
 * Geometric fitting of a source raster to the panel.
 */

import { ImageEncodingError } from '../exceptions';
import {
  HeightTreatment,
  HorizontalAlignment,
  VerticalAlignment,
  WidthTreatment,
} from '../models/enums';
import type { PanelDimensions } from '../models/panel';

export interface FitResult {
  /** Width to resample the source to */
  scaledWidth: number;
  /** Height to resample the source to */
  scaledHeight: number;
  /** Width of the packed output (the height is always the panel height) */
  outputWidth: number;
}

/**
 * Work out resample size and output width for a source image.
 *
 * Width treatment runs first, then height treatment; with AS_IS width and
 * SCALE height the aspect ratio is kept and the output is never narrower
 * than the panel.
 *
 * @throws {ImageEncodingError} If the source has no pixels and must be scaled
 */
export function computeFit(
  sourceWidth: number,
  sourceHeight: number,
  panel: PanelDimensions,
  widthTreatment: WidthTreatment,
  heightTreatment: HeightTreatment
): FitResult {
  let scaledWidth = sourceWidth;
  let scaledHeight = sourceHeight;
  let outputWidth = sourceWidth;

  const scales =
    widthTreatment === WidthTreatment.SCALE || heightTreatment === HeightTreatment.SCALE;
  if (scales && (sourceWidth < 1 || sourceHeight < 1)) {
    throw new ImageEncodingError(`Cannot scale an empty ${sourceWidth}x${sourceHeight} image`);
  }

  if (widthTreatment === WidthTreatment.SCALE) {
    scaledWidth = panel.width;
    outputWidth = panel.width;
    scaledHeight = Math.trunc((panel.width * sourceHeight) / sourceWidth);
  } else if (widthTreatment === WidthTreatment.CROP_PAD) {
    outputWidth = panel.width;
  }

  if (heightTreatment === HeightTreatment.SCALE) {
    scaledHeight = panel.height;
    if (widthTreatment === WidthTreatment.AS_IS) {
      scaledWidth = Math.trunc((panel.height * sourceWidth) / sourceHeight);
      outputWidth = Math.max(scaledWidth, panel.width);
    }
  }

  return { scaledWidth, scaledHeight, outputWidth };
}

/**
 * Placement of the source along one axis.
 *
 * `pad` shifts the source into the output, `crop` skips leading source
 * pixels. At most one of them is non-zero.
 */
export interface AxisPlacement {
  pad: number;
  crop: number;
}

type AxisAlignment = 'start' | 'center' | 'end';

export function placeAxis(sourceLength: number, outputLength: number, alignment: AxisAlignment): AxisPlacement {
  if (alignment === 'start' || sourceLength === outputLength) {
    return { pad: 0, crop: 0 };
  }

  if (sourceLength < outputLength) {
    const slack = outputLength - sourceLength;
    return { pad: alignment === 'center' ? Math.floor(slack / 2) : slack, crop: 0 };
  }

  const overflow = sourceLength - outputLength;
  return { pad: 0, crop: alignment === 'center' ? Math.floor(overflow / 2) : overflow };
}

export function placeHorizontal(
  sourceWidth: number,
  outputWidth: number,
  alignment: HorizontalAlignment
): AxisPlacement {
  switch (alignment) {
    case HorizontalAlignment.CENTER:
      return placeAxis(sourceWidth, outputWidth, 'center');
    case HorizontalAlignment.RIGHT:
      return placeAxis(sourceWidth, outputWidth, 'end');
    case HorizontalAlignment.LEFT:
    case HorizontalAlignment.NONE:
      return placeAxis(sourceWidth, outputWidth, 'start');
  }
}

export function placeVertical(
  sourceHeight: number,
  outputHeight: number,
  alignment: VerticalAlignment
): AxisPlacement {
  switch (alignment) {
    case VerticalAlignment.CENTER:
      return placeAxis(sourceHeight, outputHeight, 'center');
    case VerticalAlignment.BOTTOM:
      return placeAxis(sourceHeight, outputHeight, 'end');
    case VerticalAlignment.TOP:
      return placeAxis(sourceHeight, outputHeight, 'start');
  }
}
