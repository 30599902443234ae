/**
 * LS3 Document Reader
 *
 * Extracts the records of an LS3 element tree. Values stay in Zusi
 * coordinates; the importer converts them.
 */

import { LS3_ELEMENTS, MATERIAL_DEFAULTS, TEXTURE_STAGE_ATTRIBUTES } from '../../constants/ls3';
import { XmlNode } from '../../core/xml-node';
import { Ls3ErrorFactory } from '../../errors';
import { RenderStateSchema, type RenderState, type SceneInfo } from '../../schemas';
import type { Vec3 } from '../../types';
import { parseColor } from '../../utils/xml-formatter';
import type { Face, MeshVertex } from '../shared/mesh-types';

export type Rgba = [number, number, number, number];

export interface Ls3SubsetRecord {
  landscapeType: string;
  gfType: string;
  forceBrightness: number;
  signalMagnification: number;
  zBias: number;
  doubleSided: boolean;
  diffuse: Rgba | undefined;
  ambient: Rgba | undefined;
  emit: Rgba | undefined;
  /** Undefined when the subset had no material */
  texturePreset: string | undefined;
  /** Present for the custom texture preset */
  renderState: RenderState | undefined;
  /** Zusi paths, at most two */
  textures: string[];
  vertexCount: number;
  indexCount: number;
  /** Mesh data stored in the LS3 file itself */
  inline: { vertices: MeshVertex[]; faces: Face[] } | null;
}

export interface Ls3LinkRecord {
  file: string;
  groupName: string;
  visibleFrom: number;
  visibleTo: number;
  preloadFactor: number;
  radius: number;
  brightness: number;
  lodMask: number;
  flags: number;
  position: Vec3;
  rotation: Vec3;
  scale: Vec3;
}

export interface Ls3AnchorRecord {
  category: string;
  type: string;
  description: string;
  position: Vec3;
  rotation: Vec3;
  files: string[];
}

export interface Ls3FileRecord {
  info: SceneInfo;
  lsbFile: string | null;
  subsets: Ls3SubsetRecord[];
  links: Ls3LinkRecord[];
  anchors: Ls3AnchorRecord[];
}

const ALL_LOD_LEVELS = 15;

function readXYZ(element: XmlNode | undefined, fallback: Vec3 = [0, 0, 0]): Vec3 {
  if (element === undefined) {
    return fallback;
  }
  return [element.getNumber('X'), element.getNumber('Y'), element.getNumber('Z')];
}

function readColor(element: XmlNode, key: string): Rgba | undefined {
  const raw = element.getAttribute(key);
  return raw === undefined ? undefined : parseColor(raw);
}

function readInfo(element: XmlNode | undefined): SceneInfo {
  return {
    objectId: element?.getAttribute('ObjektID') ?? '',
    license: element?.getAttribute('Lizenz') ?? '',
    description: element?.getAttribute('Beschreibung') ?? '',
    authors: (element?.findChildren(LS3_ELEMENTS.AUTHOR) ?? []).map(author => ({
      id: author.getNumber('AutorID'),
      name: author.getAttribute('AutorName') ?? '',
      email: author.getAttribute('AutorEmail') ?? '',
      effort: author.getNumber('AutorAufwand'),
      license: author.getAttribute('AutorLizenz') ?? '0',
      remarks: author.getAttribute('AutorBeschreibung') ?? '',
    })),
  };
}

function readInlineMesh(element: XmlNode): Ls3SubsetRecord['inline'] {
  const vertexElements = element.findChildren(LS3_ELEMENTS.VERTEX);
  const faceElements = element.findChildren(LS3_ELEMENTS.FACE);
  if (vertexElements.length === 0 && faceElements.length === 0) {
    return null;
  }

  const vertices = vertexElements.map((vertex): MeshVertex => ({
    position: readXYZ(vertex.findChild(LS3_ELEMENTS.POSITION)),
    normal: readXYZ(vertex.findChild(LS3_ELEMENTS.NORMAL)),
    uv1: [vertex.getNumber('U'), vertex.getNumber('V')],
    uv2: [vertex.getNumber('U2'), vertex.getNumber('V2')],
  }));

  const faces = faceElements.map((face): Face => {
    const indices = (face.getAttribute('i') ?? '').split(';').map(Number);
    if (indices.length !== 3 || indices.some(i => !Number.isInteger(i) || i < 0 || i >= vertices.length)) {
      throw Ls3ErrorFactory.schemaError(`Invalid face indices "${face.getAttribute('i') ?? ''}"`, LS3_ELEMENTS.FACE);
    }
    // Stored in reverse winding, like the binary stream
    return [indices[2], indices[1], indices[0]];
  });

  return { vertices, faces };
}

function optionalNumber(element: XmlNode, key: string): number | undefined {
  return element.hasAttribute(key) ? element.getNumber(key) : undefined;
}

function readRenderState(flags: XmlNode): RenderState {
  const textureStages = LS3_ELEMENTS.TEXTURE_STAGES.map(name => {
    const stage = flags.findChild(name);
    const fields: Record<string, number | undefined> = {};
    for (const [attribute, field] of TEXTURE_STAGE_ATTRIBUTES) {
      fields[field] = stage === undefined ? undefined : optionalNumber(stage, attribute);
    }
    return fields;
  });

  const result = RenderStateSchema.safeParse({
    shadeMode: optionalNumber(flags, 'SHADEMODE'),
    srcBlend: optionalNumber(flags, 'SRCBLEND'),
    destBlend: optionalNumber(flags, 'DESTBLEND'),
    alphaBlendEnable: flags.getAttribute('ALPHABLENDENABLE') === '1',
    alphaRef: optionalNumber(flags, 'ALPHAREF'),
    textureStages,
  });
  if (!result.success) {
    throw Ls3ErrorFactory.schemaError('Invalid render flags', LS3_ELEMENTS.RENDER_FLAGS, result.error);
  }
  return result.data;
}

function readSubset(element: XmlNode): Ls3SubsetRecord {
  const renderFlags = element.findChild(LS3_ELEMENTS.RENDER_FLAGS);
  const texturePreset = renderFlags?.getAttribute('TexVoreinstellung');
  return {
    landscapeType: element.getAttribute('TypLs3') ?? MATERIAL_DEFAULTS.LANDSCAPE_TYPE,
    gfType: element.getAttribute('TypGF') ?? MATERIAL_DEFAULTS.GF_TYPE,
    forceBrightness: element.getNumber('Zwangshelligkeit'),
    signalMagnification: element.getNumber('zZoom'),
    zBias: element.getNumber('zBias'),
    doubleSided: element.getAttribute('DoppeltRendern') === '1',
    diffuse: readColor(element, 'Cd'),
    ambient: readColor(element, 'Ca'),
    emit: readColor(element, 'Ce'),
    texturePreset,
    renderState: renderFlags !== undefined && texturePreset === MATERIAL_DEFAULTS.CUSTOM_TEXTURE_PRESET
      ? readRenderState(renderFlags)
      : undefined,
    textures: element.findChildren(LS3_ELEMENTS.TEXTURE)
      .map(texture => texture.findChild(LS3_ELEMENTS.FILE)?.getAttribute('Dateiname') ?? '')
      .filter(file => file !== ''),
    vertexCount: element.getNumber('MeshV'),
    indexCount: element.getNumber('MeshI'),
    inline: readInlineMesh(element),
  };
}

function readLink(element: XmlNode): Ls3LinkRecord {
  return {
    file: element.findChild(LS3_ELEMENTS.FILE)?.getAttribute('Dateiname') ?? '',
    groupName: element.getAttribute('GruppenName') ?? '',
    visibleFrom: element.getNumber('SichtbarAb'),
    visibleTo: element.getNumber('SichtbarBis'),
    preloadFactor: element.getNumber('Vorlade'),
    radius: element.getNumber('BoundingR'),
    brightness: element.getNumber('Helligkeit'),
    lodMask: element.getNumber('LODbit', ALL_LOD_LEVELS),
    flags: element.getNumber('Flags'),
    position: readXYZ(element.findChild(LS3_ELEMENTS.POSITION)),
    rotation: readXYZ(element.findChild(LS3_ELEMENTS.ROTATION)),
    scale: readXYZ(element.findChild(LS3_ELEMENTS.SCALE), [1, 1, 1]),
  };
}

function readAnchor(element: XmlNode): Ls3AnchorRecord {
  return {
    category: element.getAttribute('AnkerKat') ?? '0',
    type: element.getAttribute('AnkerTyp') ?? '0',
    description: element.getAttribute('Beschreibung') ?? '',
    position: readXYZ(element.findChild(LS3_ELEMENTS.POSITION)),
    rotation: readXYZ(element.findChild(LS3_ELEMENTS.ROTATION)),
    files: element.findChildren(LS3_ELEMENTS.FILE)
      .map(file => file.getAttribute('Dateiname') ?? '')
      .filter(file => file !== ''),
  };
}

export function readLs3Document(root: XmlNode): Ls3FileRecord {
  if (root.name !== LS3_ELEMENTS.ROOT) {
    throw Ls3ErrorFactory.schemaError(`Expected <${LS3_ELEMENTS.ROOT}> root element, found <${root.name}>`, root.name);
  }

  const landscape = root.findChild(LS3_ELEMENTS.LANDSCAPE);
  return {
    info: readInfo(root.findChild(LS3_ELEMENTS.INFO)),
    lsbFile: landscape?.findChild(LS3_ELEMENTS.LSB)?.getAttribute('Dateiname') ?? null,
    subsets: (landscape?.findChildren(LS3_ELEMENTS.SUBSET) ?? []).map(readSubset),
    links: (landscape?.findChildren(LS3_ELEMENTS.LINK) ?? []).map(readLink),
    anchors: (landscape?.findChildren(LS3_ELEMENTS.ANCHOR_POINT) ?? []).map(readAnchor),
  };
}
