import { describe, it, expect } from 'vitest';
import { DescribeAsset, FormatSize } from '../src/Common/Format.js';
import { SortAssets } from '../src/Services/AssetSorter.js';
import type { SortMethod } from '../src/Services/AssetSorter.js';
import type { Asset } from '../src/Domain/Asset.js';
import { ValidationError } from '../src/Common/Errors.js';

function makeAsset(id: string, name: string, category: string, created: string, extra: Partial<Asset> = {}): Asset {
    return {
        id,
        name,
        category,
        kind: 'file',
        libraryPath: `${category}/${name}`,
        description: '',
        tags: [],
        sizeBytes: 0,
        fileExtension: '',
        createdAt: new Date(created),
        updatedAt: new Date(created),
        ...extra,
    };
}

describe('FormatSize', () => {
    it('should pick the unit by magnitude', () => {
        expect(FormatSize(0)).toBe('0 B');
        expect(FormatSize(1023)).toBe('1023 B');
        expect(FormatSize(1536)).toBe('1.5 KB');
        expect(FormatSize(2 * 1024 * 1024)).toBe('2.0 MB');
        expect(FormatSize(3 * 1024 ** 3)).toBe('3.00 GB');
    });
});

describe('DescribeAsset', () => {
    it('should summarise folders and files', () => {
        const folder = makeAsset('a', 'pack', 'Default', '2024-01-01T00:00:00Z', { kind: 'directory', sizeBytes: 1536 });
        const texture = makeAsset('b', 'rock.png', 'Default', '2024-01-01T00:00:00Z', { fileExtension: '.png', sizeBytes: 2 * 1024 * 1024 });
        const bare = makeAsset('c', 'README', 'Default', '2024-01-01T00:00:00Z', { sizeBytes: 12 });

        expect(DescribeAsset(folder)).toBe('Folder · 1.5 KB');
        expect(DescribeAsset(texture)).toBe('PNG file · 2.0 MB');
        expect(DescribeAsset(bare)).toBe('File · 12 B');
    });
});

describe('SortAssets', () => {
    const assets = [
        makeAsset('1', 'beta', 'Props', '2024-01-02T00:00:00Z'),
        makeAsset('2', 'Alpha', 'materials', '2024-01-03T00:00:00Z'),
        makeAsset('3', 'gamma', 'Materials', '2024-01-01T00:00:00Z'),
        makeAsset('4', 'alpha', 'Props', '2024-01-04T00:00:00Z'),
    ];

    const order = (method: SortMethod): string[] => SortAssets(assets, method).map(asset => asset.id);

    it('should sort by creation time', () => {
        expect(order('newest')).toEqual(['4', '2', '1', '3']);
        expect(order('oldest')).toEqual(['3', '1', '2', '4']);
    });

    it('should sort names ignoring case and keep ties stable', () => {
        expect(order('name-asc')).toEqual(['2', '4', '1', '3']);
        expect(order('name-desc')).toEqual(['3', '1', '2', '4']);
    });

    it('should sort by category, then name', () => {
        expect(order('category-asc')).toEqual(['2', '3', '4', '1']);
        expect(order('category-desc')).toEqual(['1', '4', '3', '2']);
    });

    it('should leave the input untouched', () => {
        SortAssets(assets, 'name-asc');

        expect(assets.map(asset => asset.id)).toEqual(['1', '2', '3', '4']);
    });

    it('should reject unknown methods', () => {
        const method: string = 'size-asc';
        expect(() => SortAssets(assets, method as SortMethod)).toThrow(ValidationError);
    });
});
