'use client';

import { useForm } from 'react-hook-form';
import { zodResolver } from '@hookform/resolvers/zod';
import { z } from 'zod';
import { useMutation } from '@tanstack/react-query';
import { AlertCircle, ClipboardList, Loader2, Send } from 'lucide-react';
import { toast } from 'sonner';

import { Alert, AlertDescription, AlertTitle } from '~/components/ui/alert';
import { Button } from '~/components/ui/button';
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '~/components/ui/card';
import {
    Form,
    FormControl,
    FormField,
    FormItem,
    FormLabel,
    FormMessage,
} from '~/components/ui/form';
import { Input } from '~/components/ui/input';
import { Textarea } from '~/components/ui/textarea';
import { describeApiError } from '~/lib/card-api';
import { buildCardPayload } from '~/lib/card-payload';
import { useCardApi } from '~/lib/hooks/use-card-api';
import { EXPORT_FILENAMES } from '~/lib/spreadsheet';

import { CreatedCardResult } from './created-card-result';

// Nothing is required: the backend decides what it accepts
export const manualCardSchema = z.object({
    name: z.string(),
    designation: z.string(),
    company: z.string(),
    phone_numbers: z.string(),
    email: z.string(),
    website: z.string(),
    address: z.string(),
    social_links: z.string(),
    additional_notes: z.string(),
});

export type ManualCardFormValues = z.infer<typeof manualCardSchema>;

const EMPTY_VALUES: ManualCardFormValues = {
    name: '',
    designation: '',
    company: '',
    phone_numbers: '',
    email: '',
    website: '',
    address: '',
    social_links: '',
    additional_notes: '',
};

type TextFieldName = Exclude<keyof ManualCardFormValues, 'address' | 'additional_notes'>;

const TEXT_FIELDS: { name: TextFieldName; label: string; placeholder: string }[] = [
    { name: 'name', label: 'Full name', placeholder: 'Jane Doe' },
    { name: 'designation', label: 'Designation / Title', placeholder: 'Head of Sales' },
    { name: 'company', label: 'Company', placeholder: 'Example Ltd' },
    { name: 'phone_numbers', label: 'Phone numbers (comma separated)', placeholder: '555-0100, 555-0101' },
    { name: 'email', label: 'Email', placeholder: 'jane@example.com' },
    { name: 'website', label: 'Website', placeholder: 'https://example.com' },
];

export function ManualCardForm() {
    const api = useCardApi();

    const form = useForm<ManualCardFormValues>({
        resolver: zodResolver(manualCardSchema),
        defaultValues: EMPTY_VALUES,
    });

    const createMutation = useMutation({
        mutationFn: (values: ManualCardFormValues) => api.createCard(buildCardPayload(values)),
        onSuccess: () => {
            toast.success('Inserted Successfully!');
            form.reset(EMPTY_VALUES);
        },
        onError: (error) => {
            console.error('Manual card creation failed:', error);
            toast.error('Failed to create card', { description: describeApiError(error) });
        },
    });

    function onSubmit(values: ManualCardFormValues) {
        createMutation.mutate(values);
    }

    return (
        <Card>
            <CardHeader>
                <CardTitle className="flex items-center gap-2">
                    <ClipboardList className="h-5 w-5" />
                    Or fill details manually
                </CardTitle>
                <CardDescription>Empty fields are left out of the saved card.</CardDescription>
            </CardHeader>
            <CardContent className="space-y-6">
                <Form {...form}>
                    <form onSubmit={form.handleSubmit(onSubmit)} className="space-y-4">
                        <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
                            {TEXT_FIELDS.map((item) => (
                                <FormField
                                    key={item.name}
                                    control={form.control}
                                    name={item.name}
                                    render={({ field }) => (
                                        <FormItem>
                                            <FormLabel>{item.label}</FormLabel>
                                            <FormControl>
                                                <Input placeholder={item.placeholder} {...field} />
                                            </FormControl>
                                            <FormMessage />
                                        </FormItem>
                                    )}
                                />
                            ))}
                        </div>

                        <FormField
                            control={form.control}
                            name="address"
                            render={({ field }) => (
                                <FormItem>
                                    <FormLabel>Address</FormLabel>
                                    <FormControl>
                                        <Textarea {...field} />
                                    </FormControl>
                                    <FormMessage />
                                </FormItem>
                            )}
                        />

                        <FormField
                            control={form.control}
                            name="social_links"
                            render={({ field }) => (
                                <FormItem>
                                    <FormLabel>Social links (comma separated)</FormLabel>
                                    <FormControl>
                                        <Input placeholder="https://linkedin.com/in/example" {...field} />
                                    </FormControl>
                                    <FormMessage />
                                </FormItem>
                            )}
                        />

                        <FormField
                            control={form.control}
                            name="additional_notes"
                            render={({ field }) => (
                                <FormItem>
                                    <FormLabel>Notes / extra info</FormLabel>
                                    <FormControl>
                                        <Textarea {...field} />
                                    </FormControl>
                                    <FormMessage />
                                </FormItem>
                            )}
                        />

                        <Button type="submit" disabled={createMutation.isPending}>
                            {createMutation.isPending ? (
                                <>
                                    <Loader2 className="mr-2 h-4 w-4 animate-spin" />
                                    Saving...
                                </>
                            ) : (
                                <>
                                    <Send className="mr-2 h-4 w-4" />
                                    Create Card (manual)
                                </>
                            )}
                        </Button>
                    </form>
                </Form>

                {createMutation.isError && (
                    <Alert variant="destructive">
                        <AlertCircle className="h-4 w-4" />
                        <AlertTitle>Could not create card</AlertTitle>
                        <AlertDescription>{describeApiError(createMutation.error)}</AlertDescription>
                    </Alert>
                )}

                {createMutation.isSuccess && (
                    <CreatedCardResult card={createMutation.data} filename={EXPORT_FILENAMES.manual} />
                )}
            </CardContent>
        </Card>
    );
}
