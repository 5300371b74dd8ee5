import { useEffect, useState } from 'react';
import { Save } from 'lucide-react';
import { updateTeamTargets } from '../lib/hooks.js';
import { TARGET_FIELDS, diffTargets, targetsToDraft } from '../lib/utils.js';
import type { TeamTargets } from '../lib/types.js';

interface TargetsPanelProps {
    targets: Record<string, TeamTargets>;
    onSaved: () => void;
}

type Draft = Record<keyof TeamTargets, string>;

/**
 * Edit one team's targets at a time. Only changed fields are sent.
 */
export function TargetsPanel({ targets, onSaved }: TargetsPanelProps) {
    const teams = Object.keys(targets);
    const [team, setTeam] = useState<string>(teams[0] ?? '');
    const current = targets[team];
    const [draft, setDraft] = useState<Draft | null>(current ? targetsToDraft(current) : null);
    const [message, setMessage] = useState<{ tone: 'ok' | 'error'; text: string } | null>(null);
    const [saving, setSaving] = useState(false);

    useEffect(() => {
        setDraft(current ? targetsToDraft(current) : null);
        setMessage(null);
    }, [team, current]);

    if (teams.length === 0) {
        return <p className="text-sm text-gray-500">No teams in the current dataset.</p>;
    }

    async function save() {
        if (!current || !draft) {
            return;
        }
        const result = diffTargets(current, draft);
        if ('error' in result) {
            setMessage({ tone: 'error', text: result.error });
            return;
        }
        if (Object.keys(result.update).length === 0) {
            setMessage({ tone: 'ok', text: 'Nothing changed' });
            return;
        }
        setSaving(true);
        try {
            await updateTeamTargets(team, result.update);
            setMessage({ tone: 'ok', text: `Saved targets for ${team}` });
            onSaved();
        } catch (err) {
            setMessage({
                tone: 'error',
                text: err instanceof Error ? err.message : 'Could not save targets',
            });
        } finally {
            setSaving(false);
        }
    }

    return (
        <div className="space-y-4">
            <label className="block text-sm font-medium text-gray-700">
                Team
                <select
                    className="mt-1 block w-full rounded-md border border-gray-300 px-3 py-2 text-sm"
                    value={team}
                    onChange={(event) => setTeam(event.target.value)}
                >
                    {teams.map((name) => (
                        <option key={name} value={name}>
                            {name}
                        </option>
                    ))}
                </select>
            </label>

            {draft && (
                <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
                    {TARGET_FIELDS.map(({ key, label }) => (
                        <label key={key} className="block text-sm font-medium text-gray-700">
                            {label}
                            <input
                                type="number"
                                min={0}
                                className="mt-1 block w-full rounded-md border border-gray-300 px-3 py-2 text-sm"
                                value={draft[key]}
                                onChange={(event) =>
                                    setDraft({ ...draft, [key]: event.target.value })
                                }
                            />
                        </label>
                    ))}
                </div>
            )}

            <div className="flex items-center gap-4">
                <button
                    type="button"
                    disabled={saving}
                    onClick={() => void save()}
                    className="inline-flex items-center gap-2 rounded-md bg-blue-600 px-4 py-2 text-sm font-medium text-white hover:bg-blue-700 disabled:opacity-50"
                >
                    <Save className="w-4 h-4" />
                    {saving ? 'Saving...' : 'Save targets'}
                </button>
                {message && (
                    <span
                        className={`text-sm ${
                            message.tone === 'ok' ? 'text-green-600' : 'text-red-600'
                        }`}
                    >
                        {message.text}
                    </span>
                )}
            </div>
        </div>
    );
}
