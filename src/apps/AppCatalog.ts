// ============================================================================
// AppCatalog — The closed set of applications the kernel can launch
// ============================================================================

export const AppId = {
    DRAWING: "drawing",
    STORIES: "stories",
    MUSIC: "music",
    PUZZLE: "puzzle",
    PARENT_PANEL: "parent_panel",
} as const;

export type AppIdType = (typeof AppId)[keyof typeof AppId];

export interface AppDescriptor {
    readonly id: AppIdType;
    readonly displayName: string;
    readonly icon: string;
    /** Memory requested from the kernel at launch. */
    readonly memoryKb: number;
    readonly priority: number;
}

export const APP_CATALOG: Readonly<Record<AppIdType, AppDescriptor>> = {
    [AppId.DRAWING]: { id: AppId.DRAWING, displayName: "Drawing", icon: "🎨", memoryKb: 128, priority: 4 },
    [AppId.STORIES]: { id: AppId.STORIES, displayName: "Stories", icon: "📚", memoryKb: 64, priority: 3 },
    [AppId.MUSIC]: { id: AppId.MUSIC, displayName: "Music", icon: "🎵", memoryKb: 96, priority: 3 },
    [AppId.PUZZLE]: { id: AppId.PUZZLE, displayName: "Puzzles", icon: "🧩", memoryKb: 80, priority: 4 },
    [AppId.PARENT_PANEL]: { id: AppId.PARENT_PANEL, displayName: "Parent Panel", icon: "🔒", memoryKb: 64, priority: 5 },
};

export function isAppId(value: string): value is AppIdType {
    return Object.prototype.hasOwnProperty.call(APP_CATALOG, value);
}
