export const he = {
  appTitle: 'תהילים פרק קיט לפי שם',
  appSubtitle:
    'יצירת מסמך עם פרקי תהילים קיט לפי אותיות השם – לשם יחיד או לרשימת שמות מקובץ אקסל.',
  loadingText: 'טוען את נוסח תהילים קיט...',

  tabSingle: 'שם יחיד',
  tabBatch: 'רשימת שמות מאקסל',

  formatLabel: 'פורמט קובץ',
  formatDocx: 'Word (DOCX)',
  formatPdf: 'PDF',

  singleTitle: 'יצירת תהילים קיט לשם אחד',
  singleNameLabel: 'שם בעברית (לדוגמה: יצחק בן אברהם)',
  singleNamePlaceholder: 'הקלדת שם...',
  singleGenerate: 'יצירת מסמך',
  singleMissingName: 'נא להזין שם בעברית.',
  singleSuccess: 'המסמך נוצר בהצלחה.',

  previewTitle: 'האותיות בשם',
  previewEmpty: 'לא נמצאו אותיות עבריות בשם.',
  previewVerses: 'פסוקים',

  batchTitle: 'יצירת תהילים קיט לרשימת שמות',
  batchInstructions: "יש להעלות קובץ אקסל עם עמודה בשם Name, ובכל שורה שם אחד בעברית.",
  batchFileLabel: 'קובץ אקסל (.xlsx / .xls / .csv)',
  batchPreviewTitle: 'תצוגה מקדימה של השמות',
  batchPreviewTotal: (total: number) => `סה״כ ${total} שמות בקובץ`,
  batchGenerate: 'יצירת קבצים לכל השמות',
  batchNoFile: 'העלו קובץ אקסל כדי לאפשר יצירה מרוכזת.',
  batchSummary: (succeeded: number, total: number) => `נוצרו ${succeeded} מסמכים מתוך ${total} שמות.`,
  batchFailuresTitle: 'שמות שלא נוצרו:',

  genericError: 'אירעה שגיאה. נסו שוב.',
  working: 'מעבד...',
};
