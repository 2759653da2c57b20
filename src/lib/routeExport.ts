import { AppError, createExportError, toError } from './errors'
import { buildRouteGpx, routeFilename } from './gpx'
import { logger } from './logger'
import { buildManifest, formatManifestText, type RouteManifest } from './manifest'
import type { GeocodeResult, RouteSet } from './types'

export interface ExportedFile {
  filename: string
  content: Buffer
}

export interface RouteSetExport {
  files: ExportedFile[]
  manifestText: string
  manifest: RouteManifest
}

export interface ExportOptions {
  /** GPX `creator` attribute */
  creator?: string
}

/**
 * Serialize every route to GPX and build the manifest. Deterministic: the
 * same route set always yields the same bytes.
 *
 * @throws AppError EXPORT_SERIALIZATION_ERROR
 */
export const exportRouteSet = (routeSet: RouteSet, options: ExportOptions = {}): RouteSetExport => {
  try {
    const files = routeSet.map((route) => ({
      filename: routeFilename(route),
      content: Buffer.from(buildRouteGpx(route, options.creator), 'utf8')
    }))

    const manifest = buildManifest(routeSet)
    const manifestText = formatManifestText(manifest)

    logger.info(`Exported ${files.length} route files`)

    return { files, manifestText, manifest }
  } catch (error) {
    if (error instanceof AppError) {
      throw error
    }
    throw createExportError(toError(error).message)
  }
}

const FAILED_GEOCODE_COLUMNS = [
  'address',
  'original_address',
  'name',
  'phone',
  'household_size',
  'items_needed',
  'special_items',
  'notes',
  'status',
  'error'
]

export const escapeCsvField = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value

/**
 * CSV of every result that did not match. Rows keep the stop record as it
 * was uploaded so they can be corrected and submitted again.
 */
export const exportFailedGeocodes = (results: readonly GeocodeResult[]): string => {
  const rows = [FAILED_GEOCODE_COLUMNS.join(',')]
  for (const result of results) {
    if (result.status === 'MATCHED') continue
    const { query } = result
    rows.push(
      [
        query.address,
        query.originalAddress ?? query.address,
        query.name ?? '',
        query.phone ?? '',
        query.householdSize === undefined ? '' : String(query.householdSize),
        query.itemsNeeded ?? '',
        query.specialItems ?? '',
        query.notes ?? '',
        result.status,
        result.errorDetail
      ]
        .map(escapeCsvField)
        .join(',')
    )
  }
  return rows.join('\n') + '\n'
}
