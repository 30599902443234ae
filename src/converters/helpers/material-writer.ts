/**
 * Material Writer
 *
 * Writes the render attributes of a subset's material onto its SubSet
 * element and appends its texture references.
 */

import * as path from 'path';
import { LS3_ELEMENTS, MATERIAL_DEFAULTS, TEXTURE_STAGE_ATTRIBUTES } from '../../constants/ls3';
import { XmlNode } from '../../core/xml-node';
import type { SceneMaterial } from '../../scene/scene-types';
import { TextureStageSchema, type RenderState } from '../../schemas';
import { computeMaterialColors } from '../../utils/color-utils';
import { pathExists, toZusiPath } from '../../utils/path-utils';
import type { WarningCollector } from '../../utils/warnings';
import { formatFloat } from '../../utils/xml-formatter';
import { activeTextures } from './subset-mesh-builder';

const DEFAULT_TEXTURE_STAGE = TextureStageSchema.parse({});

export interface MaterialWriterContext {
  zBiasMap: ReadonlyMap<number, number>;
  variantIds: readonly number[];
  /** Directory of the file being written */
  exportDirectory: string;
  dataDirectory: string;
  warnings: WarningCollector;
}

/**
 * Sets the material attributes that precede MeshV/MeshI.
 */
export function writeMaterialAttributes(element: XmlNode, material: SceneMaterial | null, context: MaterialWriterContext): void {
  if (material === null) {
    return;
  }

  if (material.landscapeType !== MATERIAL_DEFAULTS.LANDSCAPE_TYPE) {
    element.setAttribute('TypLs3', material.landscapeType);
  }
  if (material.gfType !== MATERIAL_DEFAULTS.GF_TYPE) {
    element.setAttribute('TypGF', material.gfType);
  }
  if (material.forceBrightness !== 0) {
    element.setAttribute('Zwangshelligkeit', formatFloat(material.forceBrightness));
  }
  if (material.signalMagnification !== 0) {
    element.setAttribute('zZoom', formatFloat(material.signalMagnification));
  }
  const zBias = context.zBiasMap.get(material.zOffset) ?? 0;
  if (zBias !== 0) {
    element.setAttribute('zBias', zBias);
  }
  if (material.doubleSided) {
    element.setAttribute('DoppeltRendern', 1);
  }

  const colors = computeMaterialColors(material);
  element.setAttribute('Cd', colors.diffuse);
  if (colors.ambient !== undefined) {
    element.setAttribute('Ca', colors.ambient);
  }
  if (colors.emit !== undefined) {
    element.setAttribute('Ce', colors.emit);
  }
}

/**
 * Blend state and one SubSetTexFlags child per texture stage, in the order
 * Zusi lists them.
 */
function writeRenderState(flags: XmlNode, state: RenderState): void {
  flags
    .setAttribute('SHADEMODE', state.shadeMode)
    .setAttribute('DESTBLEND', state.destBlend)
    .setAttribute('SRCBLEND', state.srcBlend);
  if (state.alphaBlendEnable) {
    flags.setAttribute('ALPHABLENDENABLE', 1);
  }
  flags.setAttribute('ALPHAREF', state.alphaRef);

  LS3_ELEMENTS.TEXTURE_STAGES.forEach((name, index) => {
    const stage = state.textureStages[index] ?? DEFAULT_TEXTURE_STAGE;
    const stageElement = flags.appendChild(name);
    for (const [attribute, field] of TEXTURE_STAGE_ATTRIBUTES) {
      stageElement.setAttribute(attribute, stage[field]);
    }
  });
}

/**
 * Appends RenderFlags and Textur children.
 */
export function writeMaterialChildren(element: XmlNode, material: SceneMaterial | null, context: MaterialWriterContext): void {
  if (material === null) {
    return;
  }

  const renderFlags = element.appendChild(LS3_ELEMENTS.RENDER_FLAGS).setAttribute('TexVoreinstellung', material.texturePreset);
  if (material.texturePreset === MATERIAL_DEFAULTS.CUSTOM_TEXTURE_PRESET) {
    writeRenderState(renderFlags, material.renderState);
  }

  for (const texture of activeTextures(material, context.variantIds)) {
    if (!pathExists(texture.path)) {
      context.warnings.missingResource(
        `Texture of material "${material.name}" not found: ${path.basename(texture.path)}`,
        texture.path
      );
    }
    const textureElement = new XmlNode(LS3_ELEMENTS.TEXTURE);
    textureElement
      .appendChild(LS3_ELEMENTS.FILE)
      .setAttribute('Dateiname', toZusiPath(texture.path, context.exportDirectory, context.dataDirectory));
    element.addChild(textureElement);
  }
}
