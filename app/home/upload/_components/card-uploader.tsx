'use client';

import { useState } from 'react';
import { useMutation } from '@tanstack/react-query';
import { AlertCircle, FileText, Image, Loader2, Upload } from 'lucide-react';
import { toast } from 'sonner';

import appConfig from '~/config/app.config';
import { Badge } from '~/components/ui/badge';
import { Button } from '~/components/ui/button';
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '~/components/ui/card';
import { Alert, AlertDescription, AlertTitle } from '~/components/ui/alert';
import { Input } from '~/components/ui/input';
import { Label } from '~/components/ui/label';
import { describeApiError } from '~/lib/card-api';
import { validateCardImage } from '~/lib/card-image';
import { useCardApi } from '~/lib/hooks/use-card-api';
import { EXPORT_FILENAMES } from '~/lib/spreadsheet';

import { CreatedCardResult } from './created-card-result';

export function CardUploader() {
    const api = useCardApi();
    const [file, setFile] = useState<File | null>(null);
    const [preview, setPreview] = useState<string | null>(null);
    const [fileError, setFileError] = useState<string | null>(null);

    const uploadMutation = useMutation({
        mutationFn: (image: File) => api.uploadCard(image),
        onSuccess: () => {
            toast.success('Inserted Successfully!');
        },
        onError: (error) => {
            console.error('Card upload failed:', error);
            toast.error('Upload failed.', { description: describeApiError(error) });
        },
    });

    const handleFileChange = (e: React.ChangeEvent<HTMLInputElement>) => {
        const selectedFile = e.target.files?.[0];
        uploadMutation.reset();
        setPreview(null);

        if (!selectedFile) {
            setFile(null);
            setFileError(null);
            return;
        }

        const problem = validateCardImage(selectedFile, appConfig.upload);
        setFileError(problem);
        setFile(problem ? null : selectedFile);
        if (problem) return;

        const reader = new FileReader();
        reader.onload = () => {
            if (typeof reader.result === 'string') setPreview(reader.result);
        };
        reader.readAsDataURL(selectedFile);
    };

    const handleUpload = () => {
        if (!file) return;
        uploadMutation.mutate(file);
    };

    const allowed = appConfig.upload.allowedExtensions.map((ext) => ext.toUpperCase()).join(', ');
    const limitMb = Math.round(appConfig.upload.maxBytes / (1024 * 1024));

    return (
        <div className="space-y-6">
            <div className="grid gap-6 lg:grid-cols-[3fr_7fr]">
                <Card>
                    <CardHeader>
                        <CardTitle>Preview</CardTitle>
                    </CardHeader>
                    <CardContent>
                        {preview ? (
                            <div className="border rounded-lg overflow-hidden">
                                <img src={preview} alt="Card preview" className="max-h-72 w-full object-contain bg-muted" />
                            </div>
                        ) : (
                            <div className="flex flex-col items-center justify-center text-muted-foreground py-12">
                                <FileText className="h-12 w-12 mb-4 opacity-50" />
                                <p>Upload a card to preview here.</p>
                            </div>
                        )}
                    </CardContent>
                </Card>

                <Card>
                    <CardHeader>
                        <CardTitle className="flex items-center gap-2">
                            <Upload className="h-5 w-5" />
                            Upload card
                        </CardTitle>
                        <CardDescription>
                            The image is sent to the OCR backend, which extracts and stores the card.
                        </CardDescription>
                    </CardHeader>
                    <CardContent className="space-y-4">
                        <div className="space-y-2">
                            <Label htmlFor="card-image">Card image</Label>
                            <Input
                                id="card-image"
                                type="file"
                                accept={appConfig.upload.allowedExtensions.map((ext) => `.${ext}`).join(',')}
                                onChange={handleFileChange}
                            />
                            <p className="text-xs text-muted-foreground">
                                Limit {limitMb}MB • {allowed}
                            </p>
                        </div>

                        {file && (
                            <div className="p-3 bg-muted rounded-lg">
                                <div className="flex items-center gap-2 text-sm">
                                    <FileText className="h-4 w-4" />
                                    <span className="font-medium truncate">{file.name}</span>
                                    <Badge variant="secondary" className="ml-auto">
                                        {(file.size / 1024).toFixed(1)} KB
                                    </Badge>
                                </div>
                            </div>
                        )}

                        {fileError && (
                            <Alert variant="destructive">
                                <AlertCircle className="h-4 w-4" />
                                <AlertDescription>{fileError}</AlertDescription>
                            </Alert>
                        )}

                        <Button onClick={handleUpload} disabled={!file || uploadMutation.isPending} className="w-full">
                            {uploadMutation.isPending ? (
                                <>
                                    <Loader2 className="mr-2 h-4 w-4 animate-spin" />
                                    Processing image with OCR and uploading...
                                </>
                            ) : (
                                <>
                                    <Image className="mr-2 h-4 w-4" />
                                    Extract &amp; Save
                                </>
                            )}
                        </Button>

                        {uploadMutation.isError && (
                            <Alert variant="destructive">
                                <AlertCircle className="h-4 w-4" />
                                <AlertTitle>Upload failed.</AlertTitle>
                                <AlertDescription>{describeApiError(uploadMutation.error)}</AlertDescription>
                            </Alert>
                        )}
                    </CardContent>
                </Card>
            </div>

            {uploadMutation.isSuccess && (
                <CreatedCardResult card={uploadMutation.data} filename={EXPORT_FILENAMES.upload} />
            )}
        </div>
    );
}
