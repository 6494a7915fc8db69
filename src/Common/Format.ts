/**
 * Display helpers for sizes and asset summaries.
 */
import type { Asset } from '../Domain/Asset.js';

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

/**
 * Human readable byte count: B, KB and MB with one decimal, GB with two.
 * @example
 * FormatSize(1536); // '1.5 KB'
 * FormatSize(3 * 1024 ** 3); // '3.00 GB'
 */
export function FormatSize(bytes: number): string {
    if (bytes < KB) {
        return `${bytes} B`;
    }
    if (bytes < MB) {
        return `${(bytes / KB).toFixed(1)} KB`;
    }
    if (bytes < GB) {
        return `${(bytes / MB).toFixed(1)} MB`;
    }
    return `${(bytes / GB).toFixed(2)} GB`;
}

/**
 * One-line summary of type and size.
 * @example
 * DescribeAsset(folder); // 'Folder · 1.5 KB'
 * DescribeAsset(texture); // 'PNG file · 2.0 MB'
 */
export function DescribeAsset(asset: Asset): string {
    switch (asset.kind) {
        case `directory`:
            return `Folder · ${FormatSize(asset.sizeBytes)}`;
        case `file`: {
            const type = asset.fileExtension ? `${asset.fileExtension.slice(1).toUpperCase()} file` : `File`;
            return `${type} · ${FormatSize(asset.sizeBytes)}`;
        }
    }
}
