import type { AppConfig } from '~/config/app.config';

export function fileExtension(filename: string): string {
    const dot = filename.lastIndexOf('.');
    return dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
}

/**
 * Returns why the file cannot be uploaded, or null when it can.
 */
export function validateCardImage(file: File, rules: AppConfig['upload']): string | null {
    const extension = fileExtension(file.name);
    if (!rules.allowedExtensions.includes(extension)) {
        return `Unsupported file type${extension ? ` ".${extension}"` : ''}. Allowed: ${rules.allowedExtensions
            .map((ext) => ext.toUpperCase())
            .join(', ')}`;
    }

    if (file.size > rules.maxBytes) {
        const limitMb = Math.round(rules.maxBytes / (1024 * 1024));
        return `File is larger than the ${limitMb}MB upload limit.`;
    }

    return null;
}
