export interface CategoryRow {
  id: number;
  name: string;
}

/** transactions table as stored */
export interface TransactionRow {
  id: number;
  description: string | null;
  amount: number;
  date: string;
  category_id: number | null;
}

/** transactions LEFT JOIN categories */
export interface TransactionWithCategoryRow {
  id: number;
  description: string | null;
  amount: number;
  date: string;
  category: string | null;
}

export interface CountRow {
  count: number;
}

export interface TableNameRow {
  name: string;
}
